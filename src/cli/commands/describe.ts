/**
 * `doctag describe`: print the descriptors built from a model file.
 */
import { Command } from 'commander';
import { z } from 'zod';
import { OutputFormatSchema } from '../../core/config/schema.js';
import { describeModel } from '../../core/model/descriptor.js';
import { findUnresolvedRules, type UnresolvedRule } from '../../core/rules/resolvable.js';
import { logger } from '../../utils/logger.js';
import { createFormatter, type DescribeReport } from '../formatters/index.js';
import { loadProject, type ProjectContext } from './shared.js';

export const DescribeOptionsSchema = z.object({
  model: z.string().optional(),
  models: z.string().optional(),
  format: OutputFormatSchema.optional(),
  config: z.string().optional(),
});

export type DescribeOptions = z.infer<typeof DescribeOptionsSchema>;

/**
 * Describe one model, or every model in the file.
 */
export function describeProject(project: ProjectContext, options: DescribeOptions): DescribeReport {
  const names = options.model ? [options.model] : project.models.names();
  const models = names.map((name) => project.models.get(name));

  // Nested models are reached from several roots; report each rule once
  const unresolved = new Map<string, UnresolvedRule>();
  for (const rule of models.flatMap((model) => findUnresolvedRules(model))) {
    unresolved.set(`${rule.model}.${rule.field}:${rule.token}`, rule);
  }

  return {
    descriptors: models.map((model) => describeModel(model)),
    unresolved: Array.from(unresolved.values()),
  };
}

export function createDescribeCommand(): Command {
  return new Command('describe')
    .description('Show store names, rules and omission settings of models')
    .option('-m, --model <name>', 'Only describe this model')
    .option('--models <path>', 'Model file (default: models.path from config)')
    .option('--format <format>', 'Output format: human or json')
    .option('--config <path>', 'Path to config file')
    .action(async (rawOptions: unknown) => {
      try {
        const options = DescribeOptionsSchema.parse(rawOptions);
        const project = await loadProject(process.cwd(), options);
        const formatter = createFormatter({
          format: options.format ?? project.config.output.format,
          colors: project.config.output.colors,
        });
        console.log(formatter.formatDescribe(describeProject(project, options)));
      } catch (error) {
        logger.error('Describe failed', error instanceof Error ? error : undefined);
        process.exitCode = 1;
      }
    });
}
