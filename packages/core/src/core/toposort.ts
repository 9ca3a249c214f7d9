/**
 * Priority topological sort for declaration ordering.
 *
 * Kahn's algorithm where the ready set is drained by priority instead of
 * FIFO: among all items whose dependencies are already emitted, the one
 * earliest in input order goes next. Feeding items in their desired order
 * therefore yields the desired order wherever dependencies allow it.
 *
 * Dependencies on ids outside the input set are ignored.
 */

/**
 * Thrown when a dependency cycle is detected during topological sort.
 */
export class CycleError extends Error {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Dependency cycle detected: ${cycle.join(' -> ')}`);
    this.name = 'CycleError';
    this.cycle = cycle;
  }
}

export interface ToposortItem {
  id: string;
  dependencies: string[];
}

/**
 * @returns ids with every dependency ahead of its dependents
 * @throws CycleError if a dependency cycle exists
 */
export function toposort(items: ToposortItem[]): string[] {
  if (items.length === 0) return [];

  const rank = new Map<string, number>();
  items.forEach((item, i) => rank.set(item.id, i));

  const successors = new Map<string, string[]>();
  const inDegree = new Map<string, number>();
  for (const item of items) {
    successors.set(item.id, []);
    inDegree.set(item.id, 0);
  }

  for (const item of items) {
    for (const dep of new Set(item.dependencies)) {
      if (!rank.has(dep) || dep === item.id) continue;
      successors.get(dep)!.push(item.id);
      inDegree.set(item.id, inDegree.get(item.id)! + 1);
    }
  }

  const ready: string[] = items.filter((item) => inDegree.get(item.id) === 0).map((item) => item.id);
  const result: string[] = [];

  while (ready.length > 0) {
    // ready is kept sorted by rank, so the head is the preferred item
    const current = ready.shift()!;
    result.push(current);

    for (const successor of successors.get(current)!) {
      const newDegree = inDegree.get(successor)! - 1;
      inDegree.set(successor, newDegree);
      if (newDegree === 0) {
        insertByRank(ready, successor, rank);
      }
    }
  }

  if (result.length < items.length) {
    throw new CycleError(findCycle(items, rank, new Set(result)));
  }

  return result;
}

function insertByRank(ready: string[], id: string, rank: Map<string, number>): void {
  const r = rank.get(id)!;
  let i = ready.length;
  while (i > 0 && rank.get(ready[i - 1])! > r) i--;
  ready.splice(i, 0, id);
}

/**
 * DFS over the unprocessed items. The returned cycle ends with a repeat of
 * its first id.
 */
function findCycle(items: ToposortItem[], rank: Map<string, number>, processed: Set<string>): string[] {
  const unprocessed = items.filter((item) => !processed.has(item.id));
  const deps = new Map<string, string[]>();
  for (const item of unprocessed) {
    deps.set(item.id, item.dependencies.filter((d) => rank.has(d) && !processed.has(d)));
  }

  const visiting = new Set<string>();
  const visited = new Set<string>();
  const path: string[] = [];

  const dfs = (node: string): string[] | null => {
    if (visited.has(node)) return null;
    if (visiting.has(node)) {
      return [...path.slice(path.indexOf(node)), node];
    }
    visiting.add(node);
    path.push(node);
    for (const dep of deps.get(node) ?? []) {
      const cycle = dfs(dep);
      if (cycle) return cycle;
    }
    path.pop();
    visiting.delete(node);
    visited.add(node);
    return null;
  };

  for (const item of unprocessed) {
    const cycle = dfs(item.id);
    if (cycle) return cycle;
  }
  return [...unprocessed.map((i) => i.id), unprocessed[0].id];
}
