export type { AssistantGateway, AssistantReply, PriorTurn } from "./types.js";
export { HttpAssistantGateway, buildRequestBody } from "./http-adapter.js";
export type { HttpAssistantGatewayConfig, ChatRequestBody, FetchLike } from "./http-adapter.js";
export {
  StreamingResponseDecoder,
  DEFAULT_MATCHERS,
  numericPrefixMatcher,
  eventStreamMatcher,
  plainLineMatcher,
  splitLines,
} from "./stream-decoder.js";
export type { DecodeOutcome, DecodeResult, LineMatcher } from "./stream-decoder.js";
