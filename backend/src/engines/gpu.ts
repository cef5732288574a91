import type { GpuDevice } from '@medrun/shared';
import logger from '../lib/logger';
import { CliRunner, type CommandRunner } from './cli';

export const NVIDIA_SMI_ARGS = [
  '--query-gpu=index,name,memory.total,uuid',
  '--format=csv,noheader,nounits',
];

/**
 * Parse `nvidia-smi --query-gpu=index,name,memory.total,uuid --format=csv,noheader,nounits`
 */
export function parseNvidiaSmiOutput(stdout: string): GpuDevice[] {
  const devices: GpuDevice[] = [];

  for (const raw of stdout.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    const fields = line.split(',').map((f) => f.trim());
    if (fields.length < 2) continue;

    const index = Number.parseInt(fields[0], 10);
    if (Number.isNaN(index)) continue;

    const memory = Number.parseInt(fields[2] ?? '', 10);
    const uuid = fields[3];

    devices.push({
      id: String(index),
      index,
      name: fields[1],
      memoryMiB: Number.isNaN(memory) ? null : memory,
      ...(uuid && uuid !== '[N/A]' ? { uuid } : {}),
      available: true,
    });
  }

  return devices;
}

/**
 * Enumerate NVIDIA GPUs. A host without the driver tools, or without GPUs,
 * yields an empty list rather than an error.
 */
export async function listNvidiaGpus(runner: CommandRunner = new CliRunner('nvidia-smi')): Promise<GpuDevice[]> {
  const result = await runner.execute(NVIDIA_SMI_ARGS, { timeoutMs: 5000 });
  if (!result.success) {
    logger.debug({ stderr: result.stderr.trim() }, 'nvidia-smi unavailable; assuming no GPUs');
    return [];
  }
  return parseNvidiaSmiOutput(result.stdout);
}
