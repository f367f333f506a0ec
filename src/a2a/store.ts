import { Task } from './types';

/**
 * In-memory task table shared by `message/send` (writer) and `tasks/get` (reader).
 *
 * Tasks are kept for the life of the process: there is no eviction and no
 * persistence, so memory grows with every `message/send` and a restart makes
 * every earlier task id unknown.
 */
export class TaskStore {
  private tasks = new Map<string, Task>();

  put(id: string, task: Task): void {
    this.tasks.set(id, task);
  }

  get(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  get size(): number {
    return this.tasks.size;
  }
}
