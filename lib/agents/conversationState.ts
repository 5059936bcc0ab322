import { ConversationState } from "../types";

export type TurnEvent = "reset" | "reply" | "document_saved" | "endpoint_error";

/**
 * Stored state of a session after a turn. An endpoint error is reported for
 * that turn only, so it leaves the stored state where it was.
 */
export function transition(from: ConversationState, event: TurnEvent): ConversationState {
  switch (event) {
    case "reset":
      return "idle";
    case "reply":
      return "conversing";
    case "document_saved":
      return "document_saved";
    case "endpoint_error":
      return from;
  }
}

/** State reported back to the caller for a turn. */
export function turnState(stored: ConversationState, event: TurnEvent): ConversationState {
  return event === "endpoint_error" ? "error" : stored;
}
