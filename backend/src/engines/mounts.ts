import { stat } from 'node:fs/promises';
import path from 'node:path';
import { BackendError } from '../lib/errors';

/**
 * Bind-mount sources must be existing absolute directories
 */
export async function assertDirectory(hostPath: string, role: 'input' | 'output'): Promise<string> {
  if (!path.isAbsolute(hostPath)) {
    throw new BackendError('InvalidMount', `The ${role} path must be absolute: ${hostPath}`);
  }

  const resolved = path.resolve(hostPath);
  try {
    const stats = await stat(resolved);
    if (!stats.isDirectory()) {
      throw new BackendError('InvalidMount', `The ${role} path is not a directory: ${resolved}`);
    }
  } catch (error) {
    if (error instanceof BackendError) throw error;
    throw new BackendError('InvalidMount', `The ${role} path does not exist: ${resolved}`, { cause: error });
  }
  return resolved;
}

export async function assertMounts(inputPath: string, outputPath: string): Promise<{ input: string; output: string }> {
  const input = await assertDirectory(inputPath, 'input');
  const output = await assertDirectory(outputPath, 'output');
  return { input, output };
}
