import type { PlanGraph } from "../graph.js";

interface QueueEntry {
  id: string;
  priority: number;
}

/** Binary min-heap keyed by declaration index. */
class MinHeap {
  private readonly data: QueueEntry[] = [];

  enqueue(entry: QueueEntry): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  dequeue(): QueueEntry | undefined {
    const min = this.data[0];
    const last = this.data.pop();
    if (last !== undefined && this.data.length > 0) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return min;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.data[parent].priority <= this.data[index].priority) {
        break;
      }
      [this.data[parent], this.data[index]] = [this.data[index], this.data[parent]];
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let smallest = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.data[left].priority < this.data[smallest].priority) {
        smallest = left;
      }
      if (right < length && this.data[right].priority < this.data[smallest].priority) {
        smallest = right;
      }
      if (smallest === index) {
        return;
      }
      [this.data[smallest], this.data[index]] = [this.data[index], this.data[smallest]];
      index = smallest;
    }
  }
}

/**
 * Kahn's algorithm. Among the vertices whose predecessors are all placed, the
 * one declared first is emitted next. Returns `null` when a cycle prevents a
 * complete ordering.
 */
export function topologicalOrder(graph: PlanGraph): string[] | null {
  const remaining = new Map<string, number>();
  const ready = new MinHeap();
  for (const vertex of graph.listVertices()) {
    const degree = graph.inDegree(vertex.id);
    remaining.set(vertex.id, degree);
    if (degree === 0) {
      ready.enqueue({ id: vertex.id, priority: vertex.index });
    }
  }

  const order: string[] = [];
  for (let entry = ready.dequeue(); entry !== undefined; entry = ready.dequeue()) {
    order.push(entry.id);
    // Duplicate arcs appear once per copy in the adjacency list, matching the
    // in-degree counted above.
    for (const next of graph.successors(entry.id)) {
      const left = (remaining.get(next) ?? 0) - 1;
      remaining.set(next, left);
      if (left === 0) {
        ready.enqueue({ id: next, priority: graph.indexOf(next) });
      }
    }
  }

  return order.length === graph.size ? order : null;
}
