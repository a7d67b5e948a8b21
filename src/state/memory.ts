import type { ChatMessage, ConversationTurn, PipelineResult } from '../types';

/**
 * Last `capacity` conversation turns, oldest first. Appending past capacity
 * evicts the oldest turn.
 */
export class MemoryWindow {
  private buffer: ConversationTurn[] = [];

  constructor(readonly capacity: number = 5) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Memory window capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  append(turn: ConversationTurn): void {
    this.buffer.push(turn);
    if (this.buffer.length > this.capacity) {
      this.buffer.splice(0, this.buffer.length - this.capacity);
    }
  }

  turns(): readonly ConversationTurn[] {
    return [...this.buffer];
  }

  clear(): void {
    this.buffer = [];
  }

  /** Chat history in the order it is replayed to the model. */
  toMessages(): ChatMessage[] {
    return this.buffer.flatMap(turn => [
      { role: 'user' as const, content: turn.input },
      { role: 'assistant' as const, content: describeResult(turn.output) }
    ]);
  }
}

export function describeResult(result: PipelineResult): string {
  switch (result.kind) {
    case 'recommendations':
      return JSON.stringify(result.recommendations);
    case 'rule_error':
      return `Rule-Based Check Failed: ${result.code} - ${result.details}`;
    case 'model_error':
      return `Error: ${result.code} - ${result.details}`;
    case 'fallback':
      return result.rawText;
  }
}
