import { BehaviorSubject, type Observable } from 'rxjs';

export interface WriteQueueStatus {
  queueLength: number;
  isProcessing: boolean;
  queuedOperations: Array<{
    label: string;
    timestamp: Date;
  }>;
}

interface QueuedWrite {
  /** Runs the task and settles the caller's promise; never rejects. */
  run: () => Promise<void>;
  label: string;
  timestamp: Date;
}

/**
 * Runs store mutations one at a time, in arrival order.
 * This is the single-writer discipline of the file-backed store: a task
 * starts only after the previous one has settled.
 */
export class WriteQueue {
  private queue: QueuedWrite[] = [];
  private isProcessingQueue = false;

  private statusSubject = new BehaviorSubject<WriteQueueStatus>({
    queueLength: 0,
    isProcessing: false,
    queuedOperations: [],
  });
  readonly status$: Observable<WriteQueueStatus> = this.statusSubject.asObservable();

  get isProcessing(): boolean {
    return this.isProcessingQueue;
  }

  get length(): number {
    return this.queue.length;
  }

  /**
   * Queue a task; the returned promise settles with the task's own outcome.
   */
  enqueue<T>(label: string, task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await task());
          } catch (error) {
            reject(error);
          }
        },
        label,
        timestamp: new Date(),
      });
      this.updateStatus();
      void this.process();
    });
  }

  private async process(): Promise<void> {
    // If already processing, the running loop picks up new items
    if (this.isProcessingQueue) {
      return;
    }

    this.isProcessingQueue = true;
    this.updateStatus();
    try {
      let item = this.queue.shift();
      while (item !== undefined) {
        this.updateStatus();
        await item.run();
        item = this.queue.shift();
      }
    } finally {
      this.isProcessingQueue = false;
      this.updateStatus();
    }
  }

  private updateStatus(): void {
    this.statusSubject.next({
      queueLength: this.queue.length,
      isProcessing: this.isProcessingQueue,
      queuedOperations: this.queue.map(item => ({ label: item.label, timestamp: item.timestamp })),
    });
  }
}
