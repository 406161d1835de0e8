export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

import type { FormatOptions, IFormatter } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';

export function createFormatter(options: FormatOptions): IFormatter {
  return options.format === 'json' ? new JsonFormatter() : new HumanFormatter(options);
}
