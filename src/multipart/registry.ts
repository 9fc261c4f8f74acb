/**
 * Parts recorded during one multipart session
 */

export interface Part {
  partNumber: number;
  /** ETag as returned by the service, quotes removed */
  eTag: string;
  size?: number;
}

export class PartRegistry {
  private readonly parts = new Map<number, Part>();
  private frozen = false;

  /**
   * Record a part. A later record for the same number replaces the earlier
   * one. Returns false, and records nothing, once frozen.
   */
  record(part: Part): boolean {
    if (this.frozen) {
      return false;
    }
    this.parts.set(part.partNumber, part);
    return true;
  }

  /** Stop accepting parts; late results of a cancelled transfer are dropped */
  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.parts.size;
  }

  sorted(): Part[] {
    return Array.from(this.parts.values()).sort((a, b) => a.partNumber - b.partNumber);
  }
}
