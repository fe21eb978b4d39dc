import type { A2ATask } from "@/lib/a2a/types";

const DEFAULT_CAPACITY = 500;

// Oldest tasks are evicted first once capacity is reached.
export class TaskStore {
  private readonly tasks = new Map<string, A2ATask>();

  constructor(private readonly capacity = DEFAULT_CAPACITY) {}

  save(task: A2ATask): void {
    this.tasks.delete(task.id);
    this.tasks.set(task.id, task);

    while (this.tasks.size > this.capacity) {
      const oldest = this.tasks.keys().next();
      if (oldest.done) {
        break;
      }
      this.tasks.delete(oldest.value);
    }
  }

  get(taskId: string): A2ATask | null {
    return this.tasks.get(taskId) ?? null;
  }

  get size(): number {
    return this.tasks.size;
  }
}
