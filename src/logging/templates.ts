// ============================================================================
// TEMPLATE REGISTRY - Named printf-style message formats
// ============================================================================

import { format } from 'node:util';

/**
 * Thrown when a template is registered after the registry has been frozen.
 */
export class TemplateRegistryFrozenError extends Error {
  constructor(name: string) {
    super(`Cannot add template "${name}": registry is frozen`);
    this.name = 'TemplateRegistryFrozenError';
  }
}

/**
 * Read-only view handed to everything that runs after startup.
 */
export interface ReadonlyTemplateRegistry {
  readonly size: number;
  has(name: string): boolean;
  get(name: string): string | undefined;
  resolve(name: string, ...args: unknown[]): string;
}

/**
 * Case-insensitive mapping from template name to format string.
 *
 * Names are stored upper-cased, so `"foo"`, `"Foo"` and `"FOO"` share one
 * entry and the last write wins. Once {@link freeze} is called the registry
 * rejects further writes.
 *
 * @example
 * ```typescript
 * const templates = new TemplateRegistry();
 * templates.add('UserCreated', 'User %s created by %s');
 * templates.resolve('USERCREATED', 'alice', 'admin');
 * // => 'User alice created by admin'
 *
 * // Unknown names are used as the format string themselves
 * templates.resolve('Took %dms', 42); // => 'Took 42ms'
 * ```
 */
export class TemplateRegistry implements ReadonlyTemplateRegistry {
  private readonly templates = new Map<string, string>();
  private frozen = false;

  add(name: string, template: string): void {
    if (this.frozen) {
      throw new TemplateRegistryFrozenError(name);
    }
    this.templates.set(name.toUpperCase(), template);
  }

  addAll(templates: Record<string, string>): void {
    for (const [name, template] of Object.entries(templates)) {
      this.add(name, template);
    }
  }

  has(name: string): boolean {
    return this.templates.has(name.toUpperCase());
  }

  get(name: string): string | undefined {
    return this.templates.get(name.toUpperCase());
  }

  get size(): number {
    return this.templates.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Format the named template with positional arguments.
   *
   * Placeholder/argument mismatches are not errors: surplus arguments are
   * appended and missing ones leave the placeholder in place.
   */
  resolve(name: string, ...args: unknown[]): string {
    const template = this.get(name);
    return format(template ?? name, ...args);
  }

  freeze(): ReadonlyTemplateRegistry {
    this.frozen = true;
    return this;
  }
}

export const DEFAULT_TEMPLATES: Readonly<Record<string, string>> = {
  GenericError: 'An error occurred: %s',
  UnexpectedError: 'Unexpected error: %s',
  UnhandledException: 'Unhandled exception: %s',
  ActionRecorded: 'Action event (%s) recorded for customer %s',
  ActionSaveFailed: 'Failed to save action event for customer %s (%s)',
};

export function loadDefaultTemplates(registry: TemplateRegistry): TemplateRegistry {
  registry.addAll(DEFAULT_TEMPLATES);
  return registry;
}
