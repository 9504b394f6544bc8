import type { DependencyCategory, DependencyPatterns } from '../types/index.js';

const CATEGORY_ORDER: readonly DependencyCategory[] = ['dataAccess', 'remote', 'fileSystem', 'service'];

export const OPERATION_LABELS: Record<DependencyCategory, string> = {
  dataAccess: 'database query',
  remote: 'HTTP request',
  fileSystem: 'file I/O operation',
  service: 'external service call',
};

/** `System.Data.Entity.DbSet<Order>` -> `DbSet` */
export function simpleTypeName(typeName: string): string {
  const withoutArgs = typeName.replace(/<.*$/s, '').replace(/\[\]$/, '').replace(/\?$/, '');
  const lastDot = withoutArgs.lastIndexOf('.');
  return lastDot === -1 ? withoutArgs : withoutArgs.slice(lastDot + 1);
}

function matches(name: string, pattern: string): boolean {
  return name === pattern || name.startsWith(pattern) || name.endsWith(pattern);
}

/**
 * First category whose patterns match the type name, in fixed category order
 */
export function classifyDependency(
  typeName: string,
  patterns: DependencyPatterns
): DependencyCategory | undefined {
  const name = simpleTypeName(typeName);
  if (!name) return undefined;
  return CATEGORY_ORDER.find((category) => patterns[category].some((p) => matches(name, p)));
}
