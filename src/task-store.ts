/**
 * Task Store
 * In-memory to-do lists keyed by user, then by category.
 *
 * Lists are created on first lookup, so an unseen (user, category) pair reads
 * as an empty list. Nothing is persisted.
 *
 * Access is unsynchronized: callers serialize pipeline runs. Running several
 * users concurrently would need a lock per (user, category) key.
 */

/** Normalized form used to compare task text */
export function normalizeTask(task: string): string {
  return task.toLowerCase().trim();
}

export class TaskStore {
  private lists = new Map<string, Map<string, string[]>>();

  /** Tasks for a user/category in insertion order */
  tasks(userId: string, category: string): readonly string[] {
    return this.list(userId, category);
  }

  add(userId: string, category: string, task: string): void {
    this.list(userId, category).push(task);
  }

  /**
   * Remove the first task matching `task` after normalization.
   * Returns the stored text of the removed task, or undefined when none matched.
   */
  remove(userId: string, category: string, task: string): string | undefined {
    const list = this.list(userId, category);
    const wanted = normalizeTask(task);
    const index = list.findIndex((t) => normalizeTask(t) === wanted);
    if (index === -1) return undefined;
    const [removed] = list.splice(index, 1);
    return removed;
  }

  users(): string[] {
    return [...this.lists.keys()];
  }

  categories(userId: string): string[] {
    return [...(this.lists.get(userId)?.keys() ?? [])];
  }

  private list(userId: string, category: string): string[] {
    let categories = this.lists.get(userId);
    if (!categories) {
      categories = new Map();
      this.lists.set(userId, categories);
    }

    let list = categories.get(category);
    if (!list) {
      list = [];
      categories.set(category, list);
    }
    return list;
  }
}
