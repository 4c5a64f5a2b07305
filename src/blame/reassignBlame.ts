import type { Logger } from 'pino';

import { DEFAULT_MAX_DEPTH } from './defaults.js';
import type { BlameStats, PackageGraph, PackageNode } from './types.js';

export type ReassignBlameOptions = {
  maxDepth?: number;
  logger?: Logger;
};

type Frame = {
  node: PackageNode;
  depth: number;
  children: string[];
  next: number;
};

type TraversalContext = {
  graph: PackageGraph;
  maxDepth: number;
  trace: ((depth: number, message: string) => void) | null;
  stats: Omit<BlameStats, 'stranded' | 'strandedBytes'>;
  stranded: Set<string>;
};

function createTracer(logger: Logger | undefined): TraversalContext['trace'] {
  if (!logger || !logger.isLevelEnabled('debug')) return null;
  return (depth, message) => {
    logger.debug({ depth }, `${'  '.repeat(depth)}${message}`);
  };
}

function enter(ctx: TraversalContext, stack: Frame[], node: PackageNode, depth: number): void {
  ctx.stats.visits += 1;
  ctx.trace?.(depth, `${node.name} (parents=${node.depParents.size} children=${node.depChildren.size})`);
  if (node.blame.kind === 'collapsed') return;
  stack.push({ node, depth, children: Array.from(node.depChildren), next: 0 });
}

function parentsOf(ctx: TraversalContext, node: PackageNode): PackageNode[] {
  const parents: PackageNode[] = [];
  for (const name of node.depParents) {
    const parent = ctx.graph.get(name);
    if (parent) parents.push(parent);
  }
  return parents;
}

// Runs once all children of the frame were visited (or skipped at the cutoff).
function settle(ctx: TraversalContext, node: PackageNode, depth: number): void {
  // Reached again through a cycle further down and already handed over.
  if (node.blame.kind === 'collapsed') return;
  if (node.depParents.size === 0) return;

  const parents = parentsOf(ctx, node);
  if (parents.every((p) => p.blame.kind === 'collapsed')) {
    ctx.stranded.add(node.name);
    ctx.trace?.(depth, `  keeping blame, all ${parents.length} parents collapsed`);
    return;
  }

  const share = node.blame.size / node.depParents.size;
  node.blame = { kind: 'collapsed' };
  ctx.stats.collapsed += 1;
  ctx.trace?.(depth, `  uploading blame to ${parents.length} parents`);

  for (const parent of parents) {
    if (parent.blame.kind === 'pending') {
      parent.blame.size += share;
    } else {
      ctx.stats.droppedBytes += share;
    }
  }
}

function visitFrom(ctx: TraversalContext, entry: PackageNode): void {
  const stack: Frame[] = [];
  enter(ctx, stack, entry, 0);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (!frame) break;

    if (frame.next < frame.children.length) {
      if (frame.depth >= ctx.maxDepth) {
        // Breaks dependency loops; the skipped children have their own entry.
        for (const skipped of frame.children.slice(frame.next)) ctx.trace?.(frame.depth, `  skip dep ${skipped}`);
        ctx.stats.cutoffs += 1;
        frame.next = frame.children.length;
        continue;
      }
      const childName = frame.children[frame.next];
      frame.next += 1;
      const child = childName === undefined ? undefined : ctx.graph.get(childName);
      if (child) enter(ctx, stack, child, frame.depth + 1);
      continue;
    }

    stack.pop();
    settle(ctx, frame.node, frame.depth);
  }
}

type OrderFrame = {
  node: PackageNode;
  children: string[];
  next: number;
};

// Every node once, dependencies before their dependents. A cycle is cut where
// the walk reaches a node it already holds.
function childrenFirstOrder(graph: PackageGraph): PackageNode[] {
  const order: PackageNode[] = [];
  const seen = new Set<string>();

  for (const [name, start] of graph) {
    if (seen.has(name)) continue;
    seen.add(name);
    const stack: OrderFrame[] = [{ node: start, children: Array.from(start.depChildren), next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (!frame) break;

      const childName = frame.children[frame.next];
      if (childName !== undefined) {
        frame.next += 1;
        const child = graph.get(childName);
        if (!child || seen.has(childName)) continue;
        seen.add(childName);
        stack.push({ node: child, children: Array.from(child.depChildren), next: 0 });
        continue;
      }

      stack.pop();
      order.push(frame.node);
    }
  }
  return order;
}

/**
 * Moves the size of every package with dependents onto those dependents,
 * splitting it equally, until only root packages hold size. The graph is
 * mutated in place. Calling it again on a processed graph changes nothing.
 */
export function reassignBlame(graph: PackageGraph, options: ReassignBlameOptions = {}): BlameStats {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }

  const ctx: TraversalContext = {
    graph,
    maxDepth,
    trace: createTracer(options.logger),
    stats: { visits: 0, cutoffs: 0, collapsed: 0, droppedBytes: 0 },
    stranded: new Set(),
  };

  // Entering dependencies first means the depth bound only ever cuts cycles.
  for (const node of childrenFirstOrder(graph)) {
    visitFrom(ctx, node);
  }

  let strandedBytes = 0;
  const stranded: string[] = [];
  for (const name of ctx.stranded) {
    const node = graph.get(name);
    if (!node || node.blame.kind !== 'pending') continue;
    stranded.push(name);
    strandedBytes += node.blame.size;
  }

  return { ...ctx.stats, stranded, strandedBytes };
}
