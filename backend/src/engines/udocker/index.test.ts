import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterAll, beforeAll, describe, test, expect } from 'vitest';
import type { RunRequest } from '@medrun/shared';
import { FakeRunner } from '../../test/fakeRunner';
import { UdockerEngine, classifyUdockerError, parseUdockerImages, parseUdockerVersion } from './index';

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) {
    out.push(line);
  }
  return out;
}

describe('parseUdockerImages', () => {
  test('reads repo:tag tokens after the header', () => {
    const stdout = 'REPOSITORIES\nmhubai/lungmask:latest    .\nubuntu:22.04    .\n';
    expect(parseUdockerImages(stdout)).toEqual([
      { reference: 'mhubai/lungmask:latest', repository: 'mhubai/lungmask', tag: 'latest' },
      { reference: 'ubuntu:22.04', repository: 'ubuntu', tag: '22.04' },
    ]);
  });
});

describe('parseUdockerVersion', () => {
  test('extracts the version field', () => {
    expect(parseUdockerVersion('udocker\nversion: 1.3.10\ntarball: udocker-englib-1.2.11.tar.gz\n')).toBe('1.3.10');
  });
});

describe('classifyUdockerError', () => {
  test('reads errors from stdout', () => {
    const result = { success: false, stdout: 'Error: image or container not available', stderr: '', exitCode: 1 };
    expect(classifyUdockerError(result, 'Internal', 'ImageNotFound')).toBe('ImageNotFound');
  });
});

describe('UdockerEngine', () => {
  let root: string;
  let request: RunRequest;

  beforeAll(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'medrun-udocker-'));
    request = { image: 'mhubai/lungmask:latest', inputPath: root, outputPath: root, gpus: [], args: ['--print'] };
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('creates then runs the container in the foreground', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'f1e2d3c4-0000-1111-2222-333344445555\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });

    const handle = await engine.createAndStart(request, { jobId: 'job-1' });

    expect(handle).toEqual({
      id: 'f1e2d3c4-0000-1111-2222-333344445555',
      name: 'medrun-job-1',
      jobId: 'job-1',
      engine: 'udocker',
    });
    expect(runner.executed).toEqual([['create', '--name=medrun-job-1', 'mhubai/lungmask:latest']]);
    expect(runner.started[0].args).toEqual([
      'run',
      '--rm',
      '-v',
      `${root}:/app/data/input_data:ro`,
      '-v',
      `${root}:/app/data/output_data:rw`,
      'medrun-job-1',
      '--print',
    ]);
  });

  test('enables nvidia support when GPUs are requested', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });

    await engine.createAndStart({ ...request, gpus: ['0'] }, { jobId: 'job-2' });
    expect(runner.executed[1]).toEqual(['setup', '--nvidia', '--force', 'medrun-job-2']);
  });

  test('removes the container when GPU setup fails', async () => {
    const runner = new FakeRunner((args) => (args[0] === 'setup' ? { success: false, stdout: 'nvidia libs not found' } : { stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });

    await expect(engine.createAndStart({ ...request, gpus: ['0'] }, { jobId: 'job-3' })).rejects.toMatchObject({
      kind: 'EngineUnavailable',
    });
    expect(runner.executed[2]).toEqual(['rm', 'medrun-job-3']);
    expect(runner.started).toEqual([]);
  });

  test('maps a missing image on create', async () => {
    const runner = new FakeRunner(
      () => ({ success: false, stdout: 'Error: image or container not available' }),
      'udocker'
    );
    const engine = new UdockerEngine({ executable: 'udocker', runner });

    await expect(engine.createAndStart(request, { jobId: 'job-4' })).rejects.toMatchObject({ kind: 'ImageNotFound' });
  });

  test('streams output and reports the exit code', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });
    const handle = await engine.createAndStart(request, { jobId: 'job-5' });
    const command = runner.started[0];

    command.write('first');
    command.write('second');
    command.exit(2);

    expect(await engine.wait(handle)).toBe(2);
    expect(await collect(engine.streamLogs(handle, { since: 1 }))).toEqual(['second']);
  });

  test('a second streamLogs starts at the current line', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });
    const handle = await engine.createAndStart(request, { jobId: 'job-7' });
    const command = runner.started[0];

    command.write('first');
    command.write('second');
    const first = collect(engine.streamLogs(handle));
    const resumed = collect(engine.streamLogs(handle));
    command.write('third');
    command.exit(0);

    expect(await first).toEqual(['first', 'second', 'third']);
    expect(await resumed).toEqual(['third']);
  });

  test('kill ends the run with the SIGKILL exit code', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });
    const handle = await engine.createAndStart(request, { jobId: 'job-6' });

    const exit = engine.wait(handle);
    await engine.kill(handle);

    expect(await exit).toBe(137);
    expect(runner.started[0].killedWith).toBe('SIGKILL');
  });

  test('wait rejects once aborted', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });
    const handle = await engine.createAndStart(request, { jobId: 'job-7' });
    const controller = new AbortController();

    const waiting = engine.wait(handle, { signal: controller.signal });
    controller.abort();
    await expect(waiting).rejects.toBeDefined();
  });

  test('release forgets the container', async () => {
    const runner = new FakeRunner(() => ({ stdout: 'cid\n' }), 'udocker');
    const engine = new UdockerEngine({ executable: 'udocker', runner });
    const handle = await engine.createAndStart(request, { jobId: 'job-8' });

    await engine.release(handle);
    expect(runner.executed.at(-1)).toEqual(['rm', 'medrun-job-8']);
    await expect(engine.kill(handle)).rejects.toMatchObject({ kind: 'NotFound' });
  });
});
