import { PRIORITIES } from '../../types/index.js';
import type { Priority } from '../../types/index.js';

/** 0-based position of `priority` in declaration order. */
export function priorityRank(priority: Priority): number {
  return PRIORITIES.indexOf(priority);
}

export function comparePriority(a: Priority, b: Priority): number {
  return priorityRank(a) - priorityRank(b);
}

export function isPriority(value: unknown): value is Priority {
  return PRIORITIES.some((priority) => priority === value);
}
