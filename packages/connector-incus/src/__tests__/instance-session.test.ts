/**
 * Execute and transfer tests for InstanceSession against the in-process
 * hypervisor. Staging happens under a per-test directory so cleanup can
 * be checked with readdir.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { Readable, Writable } from 'node:stream';
import {
  TransferFailureError,
  ValidationFailureError,
  noopUI,
  type ConnectorUI,
} from '@infra-connectors/connector-contracts';
import { InstanceConnector } from '../instance-connector.js';
import { FakeHypervisor } from './fake-hypervisor.js';

describe('InstanceSession', () => {
  let hypervisor: FakeHypervisor;
  let stagingRoot: string;
  let workDir: string;
  let ui: ConnectorUI;
  let connector: InstanceConnector;

  beforeEach(async () => {
    hypervisor = new FakeHypervisor();
    stagingRoot = await mkdtemp(path.join(tmpdir(), 'incus-staging-'));
    workDir = await mkdtemp(path.join(tmpdir(), 'incus-work-'));
    ui = { ...noopUI, info: vi.fn() };
    connector = new InstanceConnector({ executor: hypervisor, ui, tempDir: stagingRoot });
  });

  afterEach(async () => {
    await rm(stagingRoot, { recursive: true, force: true });
    await rm(workDir, { recursive: true, force: true });
  });

  describe('execute()', () => {
    it('runs the command through exec with the configured shell', async () => {
      const result = await connector.session('web1', { cwd: '/srv' }).execute('ls -la');

      expect(result).toBe(hypervisor.execResult);
      expect(hypervisor.lastRun()?.spec).toEqual({
        command: 'incus',
        args: ['exec', '-T', 'web1', '--', 'sh', '-c', 'cd /srv && ls -la'],
      });
    });

    it('requests a pty and forwards print flags', async () => {
      await connector.session('web1').execute('top', { getPty: true, printOutput: true, timeoutMs: 500 });

      const run = hypervisor.lastRun();
      expect(run?.spec.args.slice(0, 3)).toEqual(['exec', '-t', 'web1']);
      expect(run?.options).toEqual({ printOutput: true, printInput: undefined, timeoutMs: 500 });
    });

    it('layers per-call data over session data', async () => {
      const session = new InstanceConnector({ executor: hypervisor, shell: 'bash' }).session('web1', { user: 1000 });

      await session.execute('echo hi', { data: { env: { GREETING: 'hello world' } } });

      expect(hypervisor.lastRun()?.spec.args).toEqual([
        'exec',
        '-T',
        'web1',
        '--',
        'bash',
        '-c',
        "sudo -H -n -u '#1000' env GREETING='hello world' bash -c 'echo hi'",
      ]);
    });

    it('returns a non-zero exit unchanged', async () => {
      hypervisor.execResult = { success: false, exitCode: 2, stdout: '', stderr: 'ls: cannot access', timingMs: 3 };

      const result = await connector.session('web1').execute('ls /nope');

      expect(result).toEqual({ success: false, exitCode: 2, stdout: '', stderr: 'ls: cannot access', timingMs: 3 });
    });

    it('rejects invalid connector data before running anything', async () => {
      await expect(
        connector.session('web1').execute('id', { data: { user: -1 } })
      ).rejects.toBeInstanceOf(ValidationFailureError);
      expect(hypervisor.runs).toEqual([]);
    });

    it('targets the instance named by a full reference', async () => {
      await connector.session('@incus/cluster:web1').execute('true');
      expect(hypervisor.lastRun()?.spec.args[2]).toBe('cluster:web1');
    });
  });

  describe('upload()', () => {
    it('stages bytes and removes the staging file', async () => {
      const ok = await connector.session('web1').upload(Buffer.from('hello'), '/etc/motd');

      expect(ok).toBe(true);
      expect(hypervisor.files.get('web1:/etc/motd')?.toString()).toBe('hello');
      const [stagingPath] = hypervisor.pushedFrom;
      expect(stagingPath?.startsWith(stagingRoot)).toBe(true);
      expect(hypervisor.lastRun()?.spec.args).toEqual(['file', 'push', stagingPath, 'web1//etc/motd']);
      expect(await readdir(stagingRoot)).toEqual([]);
    });

    it('pushes an existing file directly', async () => {
      const file = path.join(workDir, 'app.conf');
      await writeFile(file, 'port=80\n');

      await connector.session('web1').upload(file, 'etc/app.conf');

      expect(hypervisor.pushedFrom).toEqual([await realpath(file)]);
      expect(hypervisor.files.get('web1:/etc/app.conf')?.toString()).toBe('port=80\n');
    });

    it('stages text streams as UTF-8', async () => {
      await connector.session('web1').upload(Readable.from(['héllo ', 'wörld']), '/tmp/greeting');
      expect(hypervisor.files.get('web1:/tmp/greeting')?.toString('utf8')).toBe('héllo wörld');
    });

    it('throws the push stderr and still removes the staging file', async () => {
      hypervisor.pushError = 'Error: Permission denied';

      const error = await connector
        .session('web1')
        .upload(Buffer.from('x'), '/root/secret')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferFailureError);
      expect(error).toMatchObject({ message: 'Error: Permission denied', stderr: 'Error: Permission denied' });
      expect(await readdir(stagingRoot)).toEqual([]);
    });

    it('removes the staging file when the source stream fails', async () => {
      const broken = new Readable({
        read() {
          this.destroy(new Error('stream broke'));
        },
      });

      await expect(connector.session('web1').upload(broken, '/tmp/x')).rejects.toThrow('stream broke');
      expect(hypervisor.runs).toEqual([]);
      expect(await readdir(stagingRoot)).toEqual([]);
    });

    it('confirms the destination when printing output', async () => {
      await connector.session('web1').upload(Buffer.from('x'), '/etc/motd', { printOutput: true });
      expect(ui.info).toHaveBeenCalledWith('[web1] file uploaded to instance: /etc/motd');
    });
  });

  describe('download()', () => {
    it('returns the bytes that were uploaded', async () => {
      const bytes = Buffer.from([0, 1, 2, 254, 255]);
      const session = connector.session('web1');
      const destination = path.join(workDir, 'blob.bin');

      await session.upload(bytes, '/var/lib/blob.bin');
      const ok = await session.download('/var/lib/blob.bin', destination);

      expect(ok).toBe(true);
      expect((await readFile(destination)).equals(bytes)).toBe(true);
      expect(await readdir(stagingRoot)).toEqual([]);
    });

    it('strips leading slashes from the remote path', async () => {
      hypervisor.files.set('web1:/etc/hostname', Buffer.from('web1\n'));

      await connector.session('web1').download('//etc/hostname', path.join(workDir, 'hostname'));

      const args = hypervisor.lastRun()?.spec.args ?? [];
      expect(args.slice(0, 3)).toEqual(['file', 'pull', 'web1/etc/hostname']);
      expect(args[3]?.startsWith(stagingRoot)).toBe(true);
    });

    it('writes into an open stream', async () => {
      hypervisor.files.set('web1:/etc/hostname', Buffer.from('web1\n'));
      const chunks: Buffer[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(chunk);
          callback();
        },
      });

      await connector.session('web1').download('/etc/hostname', sink);

      expect(Buffer.concat(chunks).toString()).toBe('web1\n');
    });

    it('throws the pull stderr, leaves the destination alone and cleans up', async () => {
      const destination = path.join(workDir, 'missing');

      await expect(connector.session('web1').download('/missing', destination)).rejects.toMatchObject({
        name: 'TransferFailureError',
        message: 'Error: open web1/missing: no such file or directory',
      });
      expect(await readdir(workDir)).toEqual([]);
      expect(await readdir(stagingRoot)).toEqual([]);
    });

    it('confirms the source when printing output', async () => {
      hypervisor.files.set('web1:/etc/hostname', Buffer.from('web1\n'));

      await connector.session('web1').download('/etc/hostname', path.join(workDir, 'h'), { printOutput: true });

      expect(ui.info).toHaveBeenCalledWith('[web1] file downloaded from instance: /etc/hostname');
    });
  });
});
