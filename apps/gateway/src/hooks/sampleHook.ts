/** Starter hook script printed by `tapgate sample-hook`. */
export const SAMPLE_HOOK_SCRIPT = `// Tapgate hook script.
// Define processRequest and/or processResponse. Each receives the
// body as a string and the headers as { "lower-cased-name": [values] },
// and returns [body, headers]. A \`json\` helper offers decode/encode.

function processRequest(body, headers) {
  // Modify the request body and headers here
  return [body, headers];
}

function processResponse(body, headers) {
  // Modify the response body and headers here
  return [body, headers];
}
`;
