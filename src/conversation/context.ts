import type { ChatMessage } from "../../llm/index";

export type Role = ChatMessage["role"];

export type Turn = Readonly<ChatMessage>;

export function createTurn(role: Role, content: string): Turn {
  return Object.freeze({ role, content });
}

/**
 * Append-only log of the session's turns, replayed in insertion order with
 * every request. `snapshot()` copies, so a request built from it is not
 * affected by later appends.
 */
export class ConversationContext {
  private readonly turns: Turn[] = [];

  append(turn: Turn): void {
    this.turns.push(Object.isFrozen(turn) ? turn : createTurn(turn.role, turn.content));
  }

  snapshot(): readonly Turn[] {
    return Object.freeze([...this.turns]);
  }

  get size(): number {
    return this.turns.length;
  }
}
