import { join } from 'path';
import { existsSync } from 'fs';

/**
 * Base path for static resources (prompts, data files).
 * In development this is src/; built code reads the copies under dist/.
 */
export function getResourceBasePath(): string {
  const cwd = process.cwd();

  const srcExists = existsSync(join(cwd, 'src'));
  const distPromptsExists = existsSync(join(cwd, 'dist', 'prompts'));
  const isRunningFromDist = __filename.includes('dist/') || __filename.includes('dist\\');
  const isProduction = process.env.NODE_ENV === 'production';

  if (isProduction || isRunningFromDist || (!srcExists && distPromptsExists)) {
    return join(cwd, 'dist');
  }
  return join(cwd, 'src');
}

export function getPromptsPath(): string {
  return join(getResourceBasePath(), 'prompts');
}

export function getDataPath(): string {
  return join(getResourceBasePath(), 'data');
}
