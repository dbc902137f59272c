import type { ChatMessage, ChatRole } from "../drivers/types.js";

/**
 * Ordered, append-only record of one exchange. Entries are frozen on the way
 * in; readers get copies of the list.
 */
export class Transcript {
  private readonly entries: ChatMessage[] = [];

  constructor(initial: readonly ChatMessage[] = []) {
    for (const m of initial) this.append(m);
  }

  append(message: ChatMessage): void {
    this.entries.push(Object.freeze({ ...message }));
  }

  get messages(): readonly ChatMessage[] {
    return this.entries.slice();
  }

  get length(): number {
    return this.entries.length;
  }

  byRole<R extends ChatRole>(role: R): Array<Extract<ChatMessage, { role: R }>> {
    return this.entries.filter((m): m is Extract<ChatMessage, { role: R }> => m.role === role);
  }

  /** Content of the most recent assistant message. */
  finalText(): string | undefined {
    const assistants = this.byRole("assistant");
    return assistants.length > 0 ? assistants[assistants.length - 1].content : undefined;
  }
}
