/**
 * 監査ログ
 * ツール実行と AI とのやり取りを追記のみで記録する。JSON Lines でファイルにも書き出せる。
 * エンジン自身はログを読み返さない（parseAuditLog / replayConversation は外部ツール向け）
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { cloneMessage } from './messages.js';
import type { AuditEntry, AuditEventKind, Message } from './types.js';

export interface AuditLogOptions {
  /** 指定すると各エントリを JSON Lines で追記する */
  filePath?: string;
  now?: () => Date;
}

export class AuditLog {
  private readonly log: AuditEntry[] = [];
  private readonly filePath?: string;
  private readonly now: () => Date;

  constructor(options: AuditLogOptions = {}) {
    this.filePath = options.filePath ? path.resolve(options.filePath) : undefined;
    this.now = options.now ?? (() => new Date());
    if (this.filePath) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    }
  }

  record(turnId: number, kind: AuditEventKind, payload: Record<string, unknown> = {}): AuditEntry {
    const entry: AuditEntry = Object.freeze({
      timestamp: this.now().toISOString(),
      turn_id: turnId,
      kind,
      payload,
    });
    this.log.push(entry);
    if (this.filePath) {
      fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', { mode: 0o600 });
    }
    return entry;
  }

  entries(): readonly AuditEntry[] {
    return this.log;
  }

  get size(): number {
    return this.log.length;
  }

  toJsonl(): string {
    return this.log.map((entry) => JSON.stringify(entry)).join('\n') + (this.log.length > 0 ? '\n' : '');
  }
}

const AUDIT_KINDS = [
  'turn_started',
  'message',
  'context_trimmed',
  'conversation_cleared',
  'provider_changed',
  'provider_request',
  'provider_reply',
  'provider_error',
  'provider_retry',
  'tool_call',
  'tool_result',
  'turn_completed',
  'turn_aborted',
  'turn_cancelled',
] as const satisfies readonly AuditEventKind[];

const AuditEntrySchema = z.object({
  timestamp: z.string(),
  turn_id: z.number().int(),
  kind: z.enum(AUDIT_KINDS),
  payload: z.record(z.unknown()),
});

const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().nullable(),
  tool_calls: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      arguments: z.record(z.unknown()),
      thought_signature: z.string().optional(),
    })
  ),
  tool_call_id: z.string().optional(),
});

/**
 * JSON Lines を AuditEntry の配列に戻す。不正な行は行番号付きで例外
 */
export function parseAuditLog(text: string): AuditEntry[] {
  const entries: AuditEntry[] = [];
  text.split('\n').forEach((line, index) => {
    if (!line.trim()) return;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new Error(`Invalid audit log line ${index + 1}: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = AuditEntrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid audit log line ${index + 1}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
    entries.push(parsed.data);
  });
  return entries;
}

export function readAuditLogFile(filePath: string): AuditEntry[] {
  return parseAuditLog(fs.readFileSync(filePath, 'utf8'));
}

/**
 * 監査ログから会話履歴を再構成する
 * message の追記、context_trimmed の削除、conversation_cleared の消去を順に適用
 */
export function replayConversation(entries: readonly AuditEntry[]): Message[] {
  let messages: Message[] = [];
  for (const entry of entries) {
    switch (entry.kind) {
      case 'message': {
        const parsed = MessageSchema.safeParse(entry.payload.message);
        if (parsed.success) {
          messages.push(cloneMessage(parsed.data));
        }
        break;
      }
      case 'context_trimmed': {
        const dropped = z.array(z.number().int()).safeParse(entry.payload.dropped_indices);
        if (dropped.success) {
          const drop = new Set(dropped.data);
          messages = messages.filter((_, index) => !drop.has(index));
        }
        break;
      }
      case 'conversation_cleared':
        messages = messages.filter((message) => message.role === 'system');
        break;
      default:
        break;
    }
  }
  return messages;
}
