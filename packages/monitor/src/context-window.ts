/**
 * Fixed-capacity sliding buffer of the most recent messages for one project.
 */

import type { ContextSnapshot, Message } from './types.js';

export class ContextWindow {
  private readonly messages: Message[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Context capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Add to the tail, evicting from the head once over capacity.
   * Indices must be strictly increasing.
   */
  append(message: Message): void {
    const last = this.latest;
    if (last && message.index <= last.index) {
      throw new RangeError(`Message index ${message.index} does not follow ${last.index}`);
    }

    this.messages.push(message);
    while (this.messages.length > this.capacity) {
      this.messages.shift();
    }
  }

  snapshot(): ContextSnapshot {
    return Object.freeze([...this.messages]);
  }

  get size(): number {
    return this.messages.length;
  }

  get latest(): Message | undefined {
    return this.messages[this.messages.length - 1];
  }
}
