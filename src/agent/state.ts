import { AgentError } from "../utils/errors";

export type ConversationState =
  | "awaiting_input"
  | "awaiting_model_response"
  | "dispatching_tools"
  | "idle"
  | "terminated";

const ALLOWED_TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  awaiting_input: ["awaiting_model_response", "terminated"],
  awaiting_model_response: ["dispatching_tools", "idle"],
  dispatching_tools: ["awaiting_model_response", "idle"],
  idle: ["awaiting_input", "terminated"],
  terminated: [],
};

export class IllegalTransitionError extends AgentError {
  constructor(from: ConversationState, to: ConversationState) {
    super(`Illegal conversation state transition: ${from} -> ${to}`, "ILLEGAL_TRANSITION");
    this.name = "IllegalTransitionError";
  }
}

export function canTransition(from: ConversationState, to: ConversationState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export class ConversationStateMachine {
  private current: ConversationState = "awaiting_input";

  get state(): ConversationState {
    return this.current;
  }

  transition(next: ConversationState): void {
    if (!canTransition(this.current, next)) {
      throw new IllegalTransitionError(this.current, next);
    }
    this.current = next;
  }

  get terminated(): boolean {
    return this.current === "terminated";
  }
}
