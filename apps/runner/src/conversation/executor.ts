/**
 * Conversation orchestrator: runs the turn loop between the persona user
 * and the assistant.
 *
 * Flow:
 * 1. Persona user writes the opening message
 * 2. Send the latest user message with all prior turns to the assistant
 * 3. Persona user ingests the reply and writes the next message
 * 4. Repeat until max turns, a stop condition, the user ending, or a
 *    transport error
 *
 * A transport error ends the loop without retry; the partial transcript is
 * still evaluated by the caller.
 */

import type { AssistantGateway, PriorTurn } from "@convosim/adapters";
import type { StopReason } from "@convosim/shared";
import type { PersonaUserAgent, UserTurnDecision } from "./persona-user.js";

export interface ConversationObserver {
  onUserMessage?(text: string): void;
  onAssistantMessage?(text: string, elapsedMs: number): void;
  onTransportError?(error: string): void;
  onStop?(reason: StopReason, turns: number): void;
}

export interface ConversationOutcome {
  turns: number;
  stop_reason: StopReason;
  response_times: number[];
  errors: string[];
}

export class ConversationOrchestrator {
  /** Latency of each successful assistant turn, in ms */
  readonly responseTimes: number[] = [];
  /** One entry per transport failure */
  readonly errors: string[] = [];

  constructor(
    private readonly user: PersonaUserAgent,
    private readonly gateway: AssistantGateway,
    private readonly maxTurns: number,
    private readonly observer: ConversationObserver = {},
  ) {}

  async run(): Promise<ConversationOutcome> {
    const opening = await this.user.generateInitialMessage();
    this.user.addUserMessage(opening);
    this.observer.onUserMessage?.(opening);

    let turns = 0;
    let stopReason: StopReason = "max_turns";

    while (turns < this.maxTurns) {
      if (this.user.shouldStop()) {
        stopReason = "user_ended";
        break;
      }

      const { messages } = this.user.getState();
      const last = messages.at(-1);
      if (!last || last.role !== "user") {
        stopReason = "user_ended";
        break;
      }
      const priorTurns: PriorTurn[] = messages
        .slice(0, -1)
        .map((m) => ({ role: m.role, content: m.content }));

      const reply = await this.gateway.send(last.content, priorTurns);

      if (reply.error !== null) {
        this.errors.push(reply.error);
        this.observer.onTransportError?.(reply.error);
        stopReason = "transport_error";
        break;
      }

      this.responseTimes.push(reply.elapsed_ms);
      this.observer.onAssistantMessage?.(reply.text, reply.elapsed_ms);

      const decision: UserTurnDecision = await this.user.generateResponse(reply.text);
      if (decision.message) {
        this.user.addUserMessage(decision.message);
        this.observer.onUserMessage?.(decision.message);
      }
      this.user.updateSatisfaction(decision.satisfaction);

      turns++;

      // No message means there is no further user turn to send
      if (!decision.should_continue || !decision.message) {
        stopReason = "user_ended";
        break;
      }
    }

    this.observer.onStop?.(stopReason, turns);

    return {
      turns,
      stop_reason: stopReason,
      response_times: [...this.responseTimes],
      errors: [...this.errors],
    };
  }
}
