/**
 * Formatter Factory
 *
 * The single point where formatters are instantiated.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';
import { NullFormatter } from './NullFormatter.js';

export const FORMATTER_TYPES = ['human', 'json', 'null'] as const;

export type FormatterType = (typeof FORMATTER_TYPES)[number];

export function isFormatterType(value: string): value is FormatterType {
  return FORMATTER_TYPES.some(type => type === value);
}

/**
 * Create a formatter instance
 *
 * @throws Error if the formatter type is unknown
 *
 * @example
 * ```ts
 * const formatter = createFormatter('human', { noColor: true });
 * const jsonFormatter = createFormatter('json', { verbose: true });
 * ```
 */
export function createFormatter(type: string = 'human', options: FormatterOptions = {}): Formatter {
  if (!isFormatterType(type)) {
    throw new Error(`Unknown formatter type: "${type}". Valid types: ${FORMATTER_TYPES.join(', ')}`);
  }

  switch (type) {
    case 'human':
      return new HumanFormatter(options);
    case 'json':
      return new JsonFormatter(options);
    case 'null':
      return new NullFormatter();
  }
}
