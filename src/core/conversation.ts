/**
 * 会話履歴
 * 追加されたメッセージは凍結され、変更されない。履歴の順序がモデルに送った内容の唯一の記録
 */

import { cloneMessage, systemMessage } from './messages.js';
import type { Message } from './types.js';

/** 1メッセージあたりのロール・区切りのオーバーヘッド */
const MESSAGE_OVERHEAD_TOKENS = 4;
const CHARS_PER_TOKEN = 4;

export function estimateMessageTokens(message: Message): number {
  let chars = message.content?.length ?? 0;
  for (const call of message.tool_calls) {
    chars += call.name.length + JSON.stringify(call.arguments).length;
  }
  return Math.ceil(chars / CHARS_PER_TOKEN) + MESSAGE_OVERHEAD_TOKENS;
}

export function estimateTokens(messages: readonly Message[]): number {
  return messages.reduce((total, message) => total + estimateMessageTokens(message), 0);
}

export interface TrimResult {
  /** 削除されたメッセージの、削除前のインデックス */
  droppedIndices: number[];
  tokensBefore: number;
  tokensAfter: number;
}

export class Conversation {
  private readonly history: Message[] = [];
  private turnCounter = 0;

  constructor(systemPrompt?: string) {
    if (systemPrompt) {
      this.history.push(systemMessage(systemPrompt));
    }
  }

  get messages(): readonly Message[] {
    return this.history;
  }

  get length(): number {
    return this.history.length;
  }

  get turn(): number {
    return this.turnCounter;
  }

  beginTurn(): number {
    this.turnCounter += 1;
    return this.turnCounter;
  }

  append(message: Message): Message {
    const frozen = Object.isFrozen(message) ? message : cloneMessage(message);
    this.history.push(frozen);
    return frozen;
  }

  /** system メッセージだけを残して履歴を消去。ターン番号は継続する */
  clear(): void {
    const systems = this.history.filter((message) => message.role === 'system');
    this.history.length = 0;
    this.history.push(...systems);
  }

  removeIndices(indices: readonly number[]): void {
    const drop = new Set(indices);
    const kept = this.history.filter((_, index) => !drop.has(index));
    this.history.length = 0;
    this.history.push(...kept);
  }

  /**
   * コンテキスト長の調整
   *
   * user メッセージから次の user メッセージ直前までを1つのやり取りとみなし、古いものから丸ごと削除する。
   * system メッセージと最新のやり取りは削除しない。tool_calls とその結果は常に一緒に消える。
   */
  trimToBudget(maxTokens: number): TrimResult {
    const tokensBefore = estimateTokens(this.history);
    if (tokensBefore <= maxTokens) {
      return { droppedIndices: [], tokensBefore, tokensAfter: tokensBefore };
    }

    const exchanges = this.exchanges();
    const dropped: number[] = [];
    let tokens = tokensBefore;

    // 最後のやり取り（進行中のターン）は残す
    for (const exchange of exchanges.slice(0, -1)) {
      if (tokens <= maxTokens) break;
      for (const index of exchange) {
        tokens -= estimateMessageTokens(this.history[index]);
        dropped.push(index);
      }
    }

    if (dropped.length > 0) {
      this.removeIndices(dropped);
    }
    return { droppedIndices: dropped, tokensBefore, tokensAfter: tokens };
  }

  /** system 以外のメッセージをやり取り単位に分ける */
  private exchanges(): number[][] {
    const groups: number[][] = [];
    this.history.forEach((message, index) => {
      if (message.role === 'system') return;
      const current = groups[groups.length - 1];
      if (message.role === 'user' || !current) {
        groups.push([index]);
      } else {
        current.push(index);
      }
    });
    return groups;
  }
}
