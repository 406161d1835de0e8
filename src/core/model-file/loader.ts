/**
 * Builds model definitions from YAML model files.
 */
import { defineModel } from '../model/define.js';
import type { FieldSpec, ModelDefinition, NameConvention } from '../model/types.js';
import { ModelError, ErrorCodes } from '../../utils/errors.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { ModelFileSchema, type FieldEntry, type ModelFile } from './schema.js';

export interface ModelFileOptions {
  /** Used by models without their own name_convention (default: 'lowercase') */
  nameConvention?: NameConvention;
}

/**
 * Models of one file, looked up by name.
 */
export class ModelSet {
  constructor(private readonly models: ReadonlyMap<string, ModelDefinition>) {}

  has(name: string): boolean {
    return this.models.has(name);
  }

  get(name: string): ModelDefinition {
    const model = this.models.get(name);
    if (!model) {
      throw new ModelError(ErrorCodes.UNKNOWN_MODEL, `Unknown model "${name}"`, {
        model: name,
        known: this.names(),
      });
    }
    return model;
  }

  names(): string[] {
    return Array.from(this.models.keys());
  }
}

/**
 * Build models from parsed file content. Nested model names resolve
 * lazily, so forward and self references work.
 */
export function buildModels(file: ModelFile, options: ModelFileOptions = {}): ModelSet {
  const models = new Map<string, ModelDefinition>();
  const set = new ModelSet(models);

  for (const [name, entry] of Object.entries(file.models)) {
    const fields: Record<string, FieldSpec> = {};
    for (const [source, fieldEntry] of Object.entries(entry.fields)) {
      fields[source] = toFieldSpec(fieldEntry, set);
    }
    models.set(
      name,
      defineModel(name, fields, {
        nameConvention: entry.name_convention ?? options.nameConvention,
      })
    );
  }

  return set;
}

export function parseModelFile(content: string, options: ModelFileOptions = {}): ModelSet {
  return buildModels(parseYamlWithSchema(content, ModelFileSchema), options);
}

export async function loadModelFile(filePath: string, options: ModelFileOptions = {}): Promise<ModelSet> {
  return buildModels(await loadYamlWithSchema(filePath, ModelFileSchema), options);
}

function toFieldSpec(entry: FieldEntry, set: ModelSet): FieldSpec {
  const modelName = entry.model;
  if (modelName === undefined) {
    return { kind: entry.type, tag: entry.tag };
  }
  return { kind: entry.type, tag: entry.tag, model: () => set.get(modelName) };
}
