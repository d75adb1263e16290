import {
  CLIENT_USER_AGENT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  REQUEST_TIMEOUT_ERROR,
} from "@convosim/shared";
import { StreamingResponseDecoder } from "./stream-decoder.js";
import type { AssistantGateway, AssistantReply, PriorTurn } from "./types.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpAssistantGatewayConfig {
  endpoint: string;
  /** Merged over the default headers */
  headers?: Record<string, string>;
  timeoutMs?: number;
}

interface ChatMessagePart {
  type: "text";
  text: string;
}

interface ChatMessage {
  id: string;
  role: PriorTurn["role"];
  parts: ChatMessagePart[];
}

export interface ChatRequestBody {
  messages: ChatMessage[];
}

export function buildRequestBody(message: string, priorTurns: readonly PriorTurn[]): ChatRequestBody {
  const messages: ChatMessage[] = priorTurns.map((turn, i) => ({
    id: `msg-${i}`,
    role: turn.role,
    parts: [{ type: "text", text: turn.content }],
  }));

  messages.push({
    id: `msg-${priorTurns.length}`,
    role: "user",
    parts: [{ type: "text", text: message }],
  });

  return { messages };
}

function isTimeout(error: unknown): boolean {
  if (typeof error !== "object" || error === null || !("name" in error)) return false;
  return error.name === "TimeoutError" || error.name === "AbortError";
}

/**
 * Sends one user turn per request to a chat endpoint and decodes the streamed
 * reply. Failures come back as `error` values; `send` never rejects.
 */
export class HttpAssistantGateway implements AssistantGateway {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(
    config: HttpAssistantGatewayConfig,
    private readonly decoder: StreamingResponseDecoder = new StreamingResponseDecoder(),
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.endpoint = config.endpoint;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = {
      "Content-Type": "application/json",
      Accept: "*/*",
      "User-Agent": CLIENT_USER_AGENT,
      ...config.headers,
    };
  }

  async send(message: string, priorTurns: readonly PriorTurn[]): Promise<AssistantReply> {
    const start = performance.now();
    const elapsed = () => Math.round(performance.now() - start);

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(buildRequestBody(message, priorTurns)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        const errorBody = await response.text().catch(() => null);
        const error = errorBody
          ? `API responded with status ${response.status}: ${errorBody}`
          : `API responded with status ${response.status}`;
        return { text: "", elapsed_ms: elapsed(), error };
      }

      // Reading the body is bounded by the same timeout signal
      const body = await response.text();
      const decoded = this.decoder.decodeBody(body);

      if (!decoded.ok) {
        return { text: "", elapsed_ms: elapsed(), error: decoded.error };
      }
      return { text: decoded.text, elapsed_ms: elapsed(), error: null };
    } catch (err) {
      if (isTimeout(err)) {
        return { text: "", elapsed_ms: elapsed(), error: REQUEST_TIMEOUT_ERROR };
      }
      const msg = err instanceof Error ? err.message : String(err);
      return { text: "", elapsed_ms: elapsed(), error: msg };
    }
  }
}
