export type ChatRole = "system" | "user" | "assistant";

export interface HistoryEntry {
  role: ChatRole;
  text: string;
}

/**
 * Append-only transcript of one conversation.
 *
 * An optional system message always sits first. Entries are never edited or
 * removed; a history belongs to a single session and is not safe for
 * concurrent turns.
 */
export class ConversationHistory {
  private readonly items: HistoryEntry[] = [];

  constructor(systemMessage?: string) {
    if (systemMessage !== undefined && systemMessage.trim()) {
      this.items.push({ role: "system", text: systemMessage });
    }
  }

  static fromEntries(entries: readonly HistoryEntry[]): ConversationHistory {
    const [first, ...rest] = entries;
    if (first?.role === "system" && !first.text.trim()) {
      throw new Error("A system message must not be blank");
    }
    const history =
      first?.role === "system"
        ? new ConversationHistory(first.text)
        : new ConversationHistory();

    for (const entry of first?.role === "system" ? rest : entries) {
      if (entry.role === "system") {
        throw new Error("A system message may only appear first in a history");
      }
      history.append(entry.role, entry.text);
    }

    return history;
  }

  get entries(): readonly HistoryEntry[] {
    return this.items.map((entry) => ({ ...entry }));
  }

  get length(): number {
    return this.items.length;
  }

  get hasSystemMessage(): boolean {
    return this.items[0]?.role === "system";
  }

  addUserMessage(text: string): void {
    this.append("user", text);
  }

  addAssistantMessage(text: string): void {
    this.append("assistant", text);
  }

  /** `role: text`, one entry per line, in order. */
  toTranscript(): string {
    return this.items.map((entry) => `${entry.role}: ${entry.text}`).join("\n");
  }

  private append(role: Exclude<ChatRole, "system">, text: string): void {
    this.items.push({ role, text });
  }
}
