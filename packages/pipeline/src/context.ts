export interface PipelineStats {
  handled: number;
  failed: number;
  dropped: number;
  startedAt: Date;
  uptimeMs: number;
}

/**
 * Counters shared by the workers, the ingress and the status endpoint.
 * Each counter only grows and only changes through the `record*` methods.
 */
export class PipelineContext {
  readonly startedAt: Date;
  private handledCount = 0;
  private failedCount = 0;
  private droppedCount = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {
    this.startedAt = clock();
  }

  /** A record reached the writer and was appended. */
  recordHandled(): void {
    this.handledCount++;
  }

  /** A record reached the writer but the append failed; the record is lost. */
  recordFailed(): void {
    this.failedCount++;
  }

  /** The ingress turned a record away because the queue was full. */
  recordDropped(): void {
    this.droppedCount++;
  }

  get handled(): number {
    return this.handledCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  uptimeMs(): number {
    return this.clock().getTime() - this.startedAt.getTime();
  }

  snapshot(): PipelineStats {
    return {
      handled: this.handledCount,
      failed: this.failedCount,
      dropped: this.droppedCount,
      startedAt: this.startedAt,
      uptimeMs: this.uptimeMs(),
    };
  }
}
