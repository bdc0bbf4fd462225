import { generateFbs } from './fbs.js';
import type { Generators } from './types.js';
import { generateTypeScript } from './typescript.js';

export { generateFbs } from './fbs.js';
export { CodeWriter } from './writer.js';
export { camelCase, upperSnakeCase } from '../ir/names.js';
export { DEFAULT_ROOT_MODULE, DEFAULT_RUNTIME_IMPORT, generateTypeScript, moduleStem } from './typescript.js';
export type { GeneratedFile, Generator, GeneratorOptions, Generators, TargetName } from './types.js';
export { TARGET_NAMES } from './types.js';

export const defaultGenerators: Generators = {
  ts: generateTypeScript,
  fbs: generateFbs,
};
