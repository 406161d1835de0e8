/**
 * JSON output formatter for machine consumption.
 */
import type { FieldDescriptor } from '../../core/model/descriptor.js';
import type { CheckReport, DescribeReport, IFormatter } from './types.js';

export class JsonFormatter implements IFormatter {
  formatCheck(report: CheckReport): string {
    const { outcome } = report;
    return JSON.stringify(
      {
        model: report.model,
        record: report.record,
        method: report.method,
        passed: outcome.passed,
        document: outcome.passed ? outcome.document : null,
        errors: outcome.errors ? outcome.errors.errors : [],
      },
      null,
      2
    );
  }

  formatDescribe(report: DescribeReport): string {
    return JSON.stringify(
      {
        models: report.descriptors.map((descriptor) => ({
          model: descriptor.model,
          fields: descriptor.fields.map((field) => this.transformField(field)),
          ignored: descriptor.ignored,
        })),
        unresolved: report.unresolved,
      },
      null,
      2
    );
  }

  private transformField(field: FieldDescriptor): Record<string, unknown> {
    return {
      name: field.name,
      source: field.source,
      kind: field.kind,
      model: field.nested?.model ?? null,
      omit_empty: field.omitEmpty,
      rules: field.rules.map((rule) => rule.token),
    };
  }
}
