import type { Task } from '@propscan/model';

/**
 * Task ordering: manual before automatic, then lower priority, then earlier
 * enqueue time
 */
export function compareTasks(a: Task, b: Task): number {
  if (a.manual !== b.manual) {
    return a.manual ? -1 : 1;
  }
  return a.priority - b.priority || a.enqueuedAt - b.enqueuedAt;
}

/**
 * In-memory priority queue holding at most one task per document
 */
export class TaskQueue {
  private tasks: Task[] = [];

  get size(): number {
    return this.tasks.length;
  }

  /**
   * Add a task. When the document is already queued, the better-ranked of
   * the two tasks is kept.
   *
   * @returns false when an existing task was kept instead
   */
  push(task: Task): boolean {
    const index = this.tasks.findIndex((t) => t.documentId === task.documentId);
    if (index !== -1) {
      if (compareTasks(task, this.tasks[index]) >= 0) {
        return false;
      }
      this.tasks.splice(index, 1);
    }

    const position = this.tasks.findIndex((t) => compareTasks(task, t) < 0);
    this.tasks.splice(position === -1 ? this.tasks.length : position, 0, task);
    return true;
  }

  shift(): Task | undefined {
    return this.tasks.shift();
  }

  clear(): void {
    this.tasks = [];
  }
}
