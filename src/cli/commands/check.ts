/**
 * `doctag check`: validate a JSON record against a model.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { z } from 'zod';
import { MethodSchema, OutputFormatSchema } from '../../core/config/schema.js';
import { RuleEngine } from '../../core/engine/engine.js';
import { isPlainRecord } from '../../core/model/access.js';
import { describeModel } from '../../core/model/descriptor.js';
import { reviveDates } from '../../core/model/revive.js';
import { assertRulesResolvable } from '../../core/rules/resolvable.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { readJson } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { createFormatter, type CheckReport } from '../formatters/index.js';
import { loadProject, type ProjectContext } from './shared.js';

export const CheckOptionsSchema = z.object({
  model: z.string(),
  models: z.string().optional(),
  method: MethodSchema.optional(),
  allowEmpty: z.array(z.string()).default([]),
  merge: z.array(z.string()).default([]),
  skipValidation: z.boolean().default(false),
  format: OutputFormatSchema.optional(),
  config: z.string().optional(),
});

export type CheckOptions = z.infer<typeof CheckOptionsSchema>;

/**
 * Check one record file against a loaded project. Strings on `date` fields
 * are read as dates, so an empty string is a missing date.
 */
export async function checkRecord(
  project: ProjectContext,
  recordPath: string,
  options: CheckOptions,
  projectRoot: string
): Promise<CheckReport> {
  const { config, models } = project;
  const model = models.get(options.model);

  if (config.engine.strict_rules) {
    assertRulesResolvable(model);
  }

  const record = await readJson(path.resolve(projectRoot, recordPath));
  if (!isPlainRecord(record)) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `${recordPath} must hold a JSON object`, {
      file: recordPath,
    });
  }

  const method = options.method ?? config.engine.default_method;
  const outcome = await new RuleEngine().run(model, reviveDates(describeModel(model), record), {
    method,
    allowEmptyFields: options.allowEmpty,
    mergeFields: options.merge,
    skipValidation: options.skipValidation,
  });

  return { model: model.name, record: recordPath, method, outcome };
}

/**
 * Load the project and check a record without printing.
 */
export async function runCheck(
  recordPath: string,
  options: CheckOptions,
  projectRoot: string = process.cwd()
): Promise<CheckReport> {
  const project = await loadProject(projectRoot, options);
  return checkRecord(project, recordPath, options, projectRoot);
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate a JSON record against a model')
    .argument('<record>', 'JSON file holding one record')
    .requiredOption('-m, --model <name>', 'Model to check the record against')
    .option('--models <path>', 'Model file (default: models.path from config)')
    .option('--method <method>', 'create, update or validate (default: engine.default_method)')
    .option('--allow-empty <paths...>', 'Store paths kept even when empty')
    .option('--merge <paths...>', 'Store paths merged on update')
    .option('--skip-validation', 'Apply names and omission only')
    .option('--format <format>', 'Output format: human or json')
    .option('--config <path>', 'Path to config file')
    .action(async (recordPath: string, rawOptions: unknown) => {
      try {
        const options = CheckOptionsSchema.parse(rawOptions);
        const projectRoot = process.cwd();
        const project = await loadProject(projectRoot, options);
        const report = await checkRecord(project, recordPath, options, projectRoot);
        const formatter = createFormatter({
          format: options.format ?? project.config.output.format,
          colors: project.config.output.colors,
        });
        console.log(formatter.formatCheck(report));
        process.exitCode = report.outcome.passed ? 0 : 1;
      } catch (error) {
        logger.error('Check failed', error instanceof Error ? error : undefined);
        process.exitCode = 1;
      }
    });
}
