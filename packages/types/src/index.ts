export type { HeaderMultimap, TraceMessage } from "./trace";
export { streamingPlaceholder, traceMatches } from "./trace";
