import { randomUUID } from 'node:crypto';
import type { RecordId, SequentialId, UuidId } from '../types';

export interface IdAllocator<K extends RecordId> {
  next(): K;
}

/** Integer ids starting at 1. The counter only moves forward, so deleted ids are never reissued. */
export class SequentialIdAllocator implements IdAllocator<SequentialId> {
  private counter: number;

  constructor(start = 1) {
    if (!Number.isInteger(start) || start < 1) throw new Error('sequence must start at a positive integer');
    this.counter = start;
  }

  next(): SequentialId {
    const id = this.counter;
    this.counter += 1;
    return id;
  }
}

export class UuidIdAllocator implements IdAllocator<UuidId> {
  constructor(private readonly generate: () => string = randomUUID) {}

  next(): UuidId {
    return this.generate();
  }
}
