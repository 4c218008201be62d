import { ErrorCodes, type Blueprint } from '@dockyard/shared';
import { DependencyError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export type OrderableBlueprint = Pick<Blueprint, 'name' | 'install_order' | 'prerequisites'>;

/**
 * Prerequisites of the selected blueprints that are neither selected nor
 * already installed. Sorted by name.
 */
export function findMissingPrerequisites(
  selected: readonly OrderableBlueprint[],
  installed: Iterable<string> = []
): string[] {
  const available = new Set<string>(installed);
  for (const blueprint of selected) {
    available.add(blueprint.name);
  }

  const missing = new Set<string>();
  for (const blueprint of selected) {
    for (const prerequisite of blueprint.prerequisites) {
      if (!available.has(prerequisite)) {
        missing.add(prerequisite);
      }
    }
  }
  return [...missing].sort();
}

export function assertPrerequisitesMet(
  selected: readonly OrderableBlueprint[],
  installed: Iterable<string> = []
): void {
  const missing = findMissingPrerequisites(selected, installed);
  if (missing.length > 0) {
    throw new DependencyError(
      ErrorCodes.DEPENDENCY_MISSING,
      `Missing required apps: ${missing.join(', ')}. Install these first or add them to your selection.`,
      missing
    );
  }
}

function compareReady(a: OrderableBlueprint, b: OrderableBlueprint): number {
  return a.install_order - b.install_order || a.name.localeCompare(b.name);
}

/**
 * Topological sort of the selection on prerequisites. Among blueprints that
 * are ready at the same time, lower `install_order` goes first, then name.
 * Prerequisites outside the selection are assumed installed.
 */
export function resolveInstallOrder<T extends OrderableBlueprint>(selected: readonly T[]): T[] {
  const byName = new Map<string, T>();
  for (const blueprint of selected) {
    byName.set(blueprint.name, blueprint);
  }

  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const blueprint of byName.values()) {
    const prerequisites = [...new Set(blueprint.prerequisites)].filter(name => byName.has(name));
    inDegree.set(blueprint.name, prerequisites.length);
    for (const prerequisite of prerequisites) {
      const list = dependents.get(prerequisite) ?? [];
      list.push(blueprint.name);
      dependents.set(prerequisite, list);
    }
  }

  const ready: T[] = [...byName.values()].filter(blueprint => inDegree.get(blueprint.name) === 0);
  const ordered: T[] = [];

  while (ready.length > 0) {
    ready.sort(compareReady);
    const current = ready.shift();
    if (!current) {
      break;
    }
    ordered.push(current);

    for (const dependent of dependents.get(current.name) ?? []) {
      const remaining = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, remaining);
      const blueprint = byName.get(dependent);
      if (remaining === 0 && blueprint) {
        ready.push(blueprint);
      }
    }
  }

  if (ordered.length !== byName.size) {
    const cycle = [...byName.keys()].filter(name => !ordered.some(blueprint => blueprint.name === name)).sort();
    throw new DependencyError(
      ErrorCodes.CIRCULAR_DEPENDENCY,
      `Circular dependency detected: ${cycle.join(', ')}`,
      cycle
    );
  }

  logger.debug({ order: ordered.map(blueprint => blueprint.name) }, 'Resolved install order');
  return ordered;
}
