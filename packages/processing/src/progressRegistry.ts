/**
 * Progress Registry
 *
 * Tracks the progress of running jobs. Each task is updated only through
 * the handle returned when it was registered; readers take snapshots.
 */

export interface ProgressTaskSnapshot {
  id: string;
  description: string;
  /** Seconds */
  total: number;
  /** Seconds, never above total */
  completed: number;
  speed?: number;
}

interface ProgressTask extends ProgressTaskSnapshot {
  released: boolean;
}

export interface ProgressHandle {
  readonly id: string;
  readonly total: number;
  readonly completed: number;
  /** Record the position reached; values below the current one are ignored */
  report(completed: number, speed?: number): void;
  /** Mark the task as finished */
  complete(): void;
  /** Remove the task from the registry; later updates are ignored */
  release(): void;
}

export class ProgressRegistry {
  private readonly tasks = new Map<string, ProgressTask>();
  private sequence = 0;

  register(description: string, total: number): ProgressHandle {
    if (!Number.isFinite(total) || total <= 0) {
      throw new RangeError(`Progress total must be a positive number, got ${total}`);
    }

    const task: ProgressTask = {
      id: `task-${++this.sequence}`,
      description,
      total,
      completed: 0,
      released: false,
    };
    this.tasks.set(task.id, task);

    return new TaskHandle(task, this.tasks);
  }

  /**
   * Copies of the live tasks in registration order
   */
  snapshot(): ProgressTaskSnapshot[] {
    return [...this.tasks.values()].map(({ id, description, total, completed, speed }) => ({
      id,
      description,
      total,
      completed,
      speed,
    }));
  }

  get size(): number {
    return this.tasks.size;
  }
}

class TaskHandle implements ProgressHandle {
  constructor(
    private readonly task: ProgressTask,
    private readonly tasks: Map<string, ProgressTask>
  ) {}

  get id(): string {
    return this.task.id;
  }

  get total(): number {
    return this.task.total;
  }

  get completed(): number {
    return this.task.completed;
  }

  report(completed: number, speed?: number): void {
    if (this.task.released || !Number.isFinite(completed)) return;

    const clamped = Math.min(Math.max(completed, 0), this.task.total);
    this.task.completed = Math.max(this.task.completed, clamped);
    if (speed !== undefined) this.task.speed = speed;
  }

  complete(): void {
    if (this.task.released) return;
    this.task.completed = this.task.total;
  }

  release(): void {
    this.task.released = true;
    this.tasks.delete(this.task.id);
  }
}
