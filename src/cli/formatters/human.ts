/**
 * Human-readable output formatter.
 */
import chalk from 'chalk';
import type { FieldDescriptor, RecordDescriptor } from '../../core/model/descriptor.js';
import type { CheckReport, DescribeReport, FormatOptions, IFormatter } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
    };
  }

  formatCheck(report: CheckReport): string {
    const { outcome } = report;
    const lines: string[] = [];

    const status = outcome.passed
      ? `${this.colorize('✓', 'green')} ${this.colorize('PASS', 'green')}`
      : `${this.colorize('✗', 'red')} ${this.colorize('FAIL', 'red')}`;
    lines.push(`${status}: ${report.model} (${report.record}, method: ${report.method})`);

    if (outcome.errors) {
      lines.push('');
      lines.push(`   ${this.colorize(`ERRORS (${outcome.errors.count}):`, 'red')}`);
      for (const error of outcome.errors.errors) {
        lines.push(`   - ${error.path} [${error.directive}]: ${error.message}`);
      }
      return lines.join('\n');
    }

    lines.push('');
    lines.push(`   ${this.colorize('Document:', 'cyan')}`);
    for (const line of JSON.stringify(outcome.document, null, 2).split('\n')) {
      lines.push(`   ${line}`);
    }
    return lines.join('\n');
  }

  formatDescribe(report: DescribeReport): string {
    const blocks = report.descriptors.map((descriptor) => this.formatDescriptor(descriptor));

    if (report.unresolved.length > 0) {
      const lines = [this.colorize(`Unresolved rules (${report.unresolved.length}):`, 'yellow')];
      for (const rule of report.unresolved) {
        lines.push(`   - ${rule.model}.${rule.field}: ${rule.token} (${rule.kind})`);
      }
      blocks.push(lines.join('\n'));
    }

    return blocks.join('\n\n');
  }

  private formatDescriptor(descriptor: RecordDescriptor): string {
    const lines = [this.colorize(descriptor.model, 'cyan')];
    for (const field of descriptor.fields) {
      lines.push(`   ${this.formatField(field)}`);
    }
    if (descriptor.ignored.length > 0) {
      lines.push(`   ${this.colorize(`ignored: ${descriptor.ignored.join(', ')}`, 'dim')}`);
    }
    return lines.join('\n');
  }

  private formatField(field: FieldDescriptor): string {
    const parts = [`${field.name} <- ${field.source}`, field.kind];
    const nested = field.nested;
    if (nested) {
      parts.push(`-> ${nested.model}`);
    }
    if (field.rules.length > 0) {
      parts.push(`[${field.rules.map((rule) => rule.token).join(', ')}]`);
    }
    if (field.omitEmpty.length > 0) {
      parts.push(this.colorize(`omitempty(${field.omitEmpty.join('|')})`, 'dim'));
    }
    return parts.join('  ');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
