/**
 * Topological ordering of one phase's tables
 */

import { LoadError } from '../errors/index.js';

export interface DependencyNode {
  table: string;
  foreignKeys: ReadonlyArray<{ referencedTable: string }>;
  dependsOn?: readonly string[];
}

/**
 * Order specs so referenced tables come before the tables referencing
 * them. Declaration order breaks ties. References to tables outside the
 * list and self-references do not constrain the order.
 *
 * @throws LoadError DEPENDENCY_CYCLE
 */
export function orderByDependencies<T extends DependencyNode>(specs: readonly T[]): T[] {
  const tables = new Set(specs.map((spec) => spec.table));
  const dependencies = new Map<string, string[]>(
    specs.map((spec) => [
      spec.table,
      [...spec.foreignKeys.map((fk) => fk.referencedTable), ...(spec.dependsOn ?? [])].filter(
        (table) => table !== spec.table && tables.has(table)
      ),
    ])
  );

  const ordered: T[] = [];
  const placed = new Set<string>();
  const remaining = [...specs];

  while (remaining.length > 0) {
    const index = remaining.findIndex((spec) =>
      (dependencies.get(spec.table) ?? []).every((table) => placed.has(table))
    );

    if (index === -1) {
      const blocked = remaining.map((spec) => spec.table);
      throw new LoadError({
        code: 'DEPENDENCY_CYCLE',
        message: `Tables reference each other in a cycle: ${blocked.join(', ')}`,
        suggestion: 'Move one table of the cycle to another phase or remove a dependsOn edge.',
        context: { tables: blocked },
      });
    }

    const [next] = remaining.splice(index, 1);
    if (next) {
      ordered.push(next);
      placed.add(next.table);
    }
  }

  return ordered;
}
