/**
 * CLI Validate Options
 */

import type { FormatterType } from '../formatters/createFormatter.js';

export interface CliValidateOptions {
  format?: FormatterType;
  verbose?: boolean;
  silent?: boolean;
  color?: boolean;
}
