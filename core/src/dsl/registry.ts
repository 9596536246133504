import fs from 'node:fs';
import path from 'node:path';

import { Ajv2020 } from 'ajv/dist/2020.js';
// CommonJS package: the default import is module.exports, whose `default` is the plugin
import ajvFormats from 'ajv-formats';

import { isPlainObject } from '../filter/values.js';
import { DslLoadError, DslValidationError } from './errors.js';
import { DEFAULT_DSL_SCHEMA } from './schema.js';
import { isDslModelSpec, type DslModelSpec, type DslRoot } from './types.js';

export type CompiledDsl = {
  dsl: DslRoot;
  sources: Array<{ modelKey: string; filePath: string }>;
};

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, 'utf8');
    return JSON.parse(raw);
  } catch (e) {
    throw new DslLoadError(`Failed to read JSON: ${filePath}`, { filePath, cause: e });
  }
}

function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile() && d.name.toLowerCase().endsWith('.json'))
    .map((d) => d.name)
    .sort((a, b) => a.localeCompare(b))
    .map((name) => path.join(dir, name));
}

// A fragment is either one model (bound to the file name) or a map of models.
function fragmentToModels(fragment: unknown, defaultModelKey: string): Record<string, DslModelSpec> {
  if (!isPlainObject(fragment)) {
    throw new DslLoadError('Invalid DSL fragment shape (expected object)', { defaultModelKey });
  }
  if (isDslModelSpec(fragment)) return { [defaultModelKey]: fragment };

  const out: Record<string, DslModelSpec> = {};
  for (const [k, v] of Object.entries(fragment)) {
    if (k !== '$schema' && isDslModelSpec(v)) out[k] = v;
  }
  if (!Object.keys(out).length) {
    throw new DslLoadError('DSL fragment produced no models', { defaultModelKey });
  }
  return out;
}

type SchemaInput = string | Record<string, unknown> | undefined;

function resolveSchema(input: SchemaInput): Record<string, unknown> {
  if (!input) return DEFAULT_DSL_SCHEMA;
  if (typeof input !== 'string') return input;
  const loaded = readJsonFile(input);
  if (!isPlainObject(loaded)) throw new DslLoadError(`DSL schema is not an object: ${input}`, { filePath: input });
  return loaded;
}

export function validateDslOrThrow(dsl: unknown, schemaInput?: SchemaInput): DslRoot {
  const ajv = new Ajv2020({ allErrors: true, allowUnionTypes: true });
  ajvFormats.default(ajv);
  const validate = ajv.compile<DslRoot>(resolveSchema(schemaInput));
  if (!validate(dsl)) throw new DslValidationError(validate.errors ?? []);
  return dsl;
}

export function modelsOf(dsl: DslRoot): Map<string, DslModelSpec> {
  const out = new Map<string, DslModelSpec>();
  for (const key of Object.keys(dsl).sort((a, b) => a.localeCompare(b))) {
    const spec = dsl[key];
    if (key !== '$schema' && isDslModelSpec(spec)) out.set(key, spec);
  }
  return out;
}

/** Reads every `*.json` fragment in `modelsDir` (sorted by name); later files win on key clashes. */
export function compileDslFromFs(modelsDir: string, schemaInput?: SchemaInput): CompiledDsl {
  const dir = path.resolve(modelsDir);
  const files = listJsonFiles(dir);
  if (!files.length) throw new DslLoadError('No DSL fragments found', { modelsDir: dir });

  const dsl: DslRoot = {};
  const sources: CompiledDsl['sources'] = [];
  for (const filePath of files) {
    const fragment = readJsonFile(filePath);
    const models = fragmentToModels(fragment, path.basename(filePath, path.extname(filePath)));
    if (isPlainObject(fragment) && typeof fragment.$schema === 'string' && !dsl.$schema) {
      dsl.$schema = fragment.$schema;
    }
    for (const [modelKey, spec] of Object.entries(models)) {
      dsl[modelKey] = spec;
      sources.push({ modelKey, filePath });
    }
  }

  return { dsl: validateDslOrThrow(dsl, schemaInput), sources };
}
