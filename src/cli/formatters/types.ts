/**
 * Formatter type definitions.
 */
import type { EngineOutcome } from '../../core/engine/types.js';
import type { RecordDescriptor } from '../../core/model/descriptor.js';
import type { UnresolvedRule } from '../../core/rules/resolvable.js';
import type { Method } from '../../core/tags/types.js';

export type OutputFormat = 'human' | 'json';

export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
}

/**
 * Result of checking one record file.
 */
export interface CheckReport {
  model: string;
  /** Path of the record file as given */
  record: string;
  method: Method;
  outcome: EngineOutcome;
}

export interface DescribeReport {
  descriptors: RecordDescriptor[];
  unresolved: UnresolvedRule[];
}

export interface IFormatter {
  formatCheck(report: CheckReport): string;
  formatDescribe(report: DescribeReport): string;
}
