/**
 * Sequence numbers known to exist in the target collection.
 *
 * Inserts reserve a fresh sequence and commit it only once the write is
 * confirmed, so a failed insert leaves a hole that finds and updates never
 * sample. Sequences [0, contiguous) are present; later ones are listed.
 */
export class KeySpace {
  private contiguous: number;
  private readonly committed: number[] = [];
  private next: number;

  constructor(
    initialCount: number = 0,
    private readonly random: () => number = Math.random,
  ) {
    if (!Number.isSafeInteger(initialCount) || initialCount < 0) {
      throw new RangeError(`Initial key space size must be a non-negative integer, got ${initialCount}`);
    }
    this.contiguous = initialCount;
    this.next = initialCount;
  }

  /**
   * Hand out the next unused sequence. It is not sampled until committed.
   */
  reserve(): number {
    return this.next++;
  }

  /**
   * Record `sequence` as written
   */
  commit(sequence: number): void {
    if (!Number.isSafeInteger(sequence) || sequence < this.contiguous) {
      throw new RangeError(`Cannot commit sequence ${sequence}`);
    }
    if (sequence >= this.next) {
      this.next = sequence + 1;
    }
    if (sequence === this.contiguous && this.committed.length === 0) {
      this.contiguous++;
    } else {
      this.committed.push(sequence);
    }
  }

  /**
   * Never hand out sequences below `sequence`, e.g. ones a failed preload skipped
   */
  skipTo(sequence: number): void {
    if (sequence > this.next) {
      this.next = sequence;
    }
  }

  /**
   * Uniform pick among committed sequences. Undefined when nothing exists yet.
   */
  pickExisting(): number | undefined {
    const total = this.size();
    if (total === 0) {
      return undefined;
    }
    const index = Math.floor(this.random() * total);
    return index < this.contiguous ? index : this.committed[index - this.contiguous];
  }

  size(): number {
    return this.contiguous + this.committed.length;
  }

  nextSequence(): number {
    return this.next;
  }
}
