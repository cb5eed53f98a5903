import { z } from 'zod/v4';
import { ChatRecord, ChatTranscript, chatTranscriptSchema } from '../types.js';
import { DatabaseService } from './database.js';

/**
 * Chat transcripts recorded against an instance. They are kept after the
 * instance is torn down.
 */
export interface ChatStore {
  save(correlationId: string, transcript: ChatTranscript): Promise<ChatRecord>;
  list(correlationId: string): Promise<ChatRecord[]>;
}

const chatRowSchema = z.object({
  id: z.number().int(),
  correlation_id: z.string(),
  transcript: z.string(),
  created_at: z.string(),
});

export class SqliteChatStore implements ChatStore {
  constructor(private readonly db: DatabaseService) {}

  async save(correlationId: string, transcript: ChatTranscript): Promise<ChatRecord> {
    const savedAt = new Date();
    const result = await this.db.run(
      'INSERT INTO chats (correlation_id, transcript, created_at) VALUES (?, ?, ?)',
      [correlationId, JSON.stringify(transcript), savedAt.toISOString()]
    );
    return { id: result.lastID, correlationId, transcript, savedAt };
  }

  async list(correlationId: string): Promise<ChatRecord[]> {
    const rows = await this.db.all('SELECT * FROM chats WHERE correlation_id = ? ORDER BY id ASC', [correlationId]);
    return rows.map((row) => {
      const parsed = chatRowSchema.parse(row);
      return {
        id: parsed.id,
        correlationId: parsed.correlation_id,
        transcript: chatTranscriptSchema.parse(JSON.parse(parsed.transcript)),
        savedAt: new Date(parsed.created_at),
      };
    });
  }
}

export class InMemoryChatStore implements ChatStore {
  private readonly chats: ChatRecord[] = [];

  async save(correlationId: string, transcript: ChatTranscript): Promise<ChatRecord> {
    const record: ChatRecord = {
      id: this.chats.length + 1,
      correlationId,
      transcript: structuredClone(transcript),
      savedAt: new Date(),
    };
    this.chats.push(record);
    return structuredClone(record);
  }

  async list(correlationId: string): Promise<ChatRecord[]> {
    return this.chats.filter((chat) => chat.correlationId === correlationId).map((chat) => structuredClone(chat));
  }
}
