import type { UtteranceRole } from "@convosim/shared";

export interface PriorTurn {
  role: UtteranceRole;
  content: string;
}

export interface AssistantReply {
  /** Empty when `error` is set */
  text: string;
  elapsed_ms: number;
  error: string | null;
}

export interface AssistantGateway {
  send(message: string, priorTurns: readonly PriorTurn[]): Promise<AssistantReply>;
}
