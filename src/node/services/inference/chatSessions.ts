import { randomUUID } from "crypto";
import type { ChatMessage, ChatSession, TimestampedChatMessage } from "./types";

function snapshot(session: ChatSession): ChatSession {
  return { ...session, messages: session.messages.map((m) => ({ ...m })) };
}

/**
 * In-memory chat transcripts. Messages are append-only; a system prompt,
 * when given, is the first message. Sessions handed out are copies, so only
 * append() changes a transcript.
 */
export class ChatSessionStore {
  private readonly sessions = new Map<string, ChatSession>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  private newId(): string {
    let id = randomUUID().slice(0, 8);
    while (this.sessions.has(id)) {
      id = randomUUID().slice(0, 8);
    }
    return id;
  }

  create(modelId: string, systemPrompt?: string): ChatSession {
    const timestamp = this.now().toISOString();
    const messages: TimestampedChatMessage[] = [];
    if (systemPrompt) {
      messages.push({ role: "system", content: systemPrompt, timestamp });
    }
    const session: ChatSession = {
      id: this.newId(),
      modelId,
      messages,
      systemPrompt: systemPrompt ?? null,
      createdAt: timestamp,
      lastActivity: timestamp,
    };
    this.sessions.set(session.id, session);
    return snapshot(session);
  }

  get(sessionId: string): ChatSession | null {
    const session = this.sessions.get(sessionId);
    return session ? snapshot(session) : null;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Most recently active first. */
  list(modelId?: string): ChatSession[] {
    return [...this.sessions.values()]
      .filter((s) => modelId === undefined || s.modelId === modelId)
      .sort((a, b) => b.lastActivity.localeCompare(a.lastActivity))
      .map(snapshot);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Null when the session does not exist (any more). */
  append(sessionId: string, message: ChatMessage): TimestampedChatMessage | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    const timestamp = this.now().toISOString();
    const entry: TimestampedChatMessage = { ...message, timestamp };
    session.messages.push(entry);
    session.lastActivity = timestamp;
    return { ...entry };
  }

  /** The transcript as plain chat messages, ready to send. */
  history(sessionId: string): ChatMessage[] | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    return session.messages.map(({ role, content }) => ({ role, content }));
  }

  get size(): number {
    return this.sessions.size;
  }
}
