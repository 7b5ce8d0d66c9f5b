/**
 * @module @infra-connectors/connector-incus/instance-session
 *
 * TargetSession bound to one instance. Every operation is a single
 * hypervisor CLI call run through the local CommandExecutor:
 *
 *   execute   <cli> exec -t|-T <instance> -- <shell> -c <command>
 *   upload    <cli> file push <local> <instance>/<path>
 *   download  <cli> file pull <instance>/<path> <local>
 *
 * Transfers stage through a local temp file that is removed before the
 * call returns or throws.
 */

import { readFile } from 'node:fs/promises';
import {
  TransferFailureError,
  makeUnixCommand,
  mergeConnectorData,
  parseConnectorData,
  type CommandExecutor,
  type CommandResult,
  type ConnectorData,
  type ConnectorLogger,
  type ConnectorUI,
  type ExecuteOptions,
  type ShellQuoter,
  type TargetSession,
  type TransferDestination,
  type TransferOptions,
  type TransferSource,
  type UnixShell,
} from '@infra-connectors/connector-contracts';
import {
  readSource,
  resolveLocalFile,
  withTempFile,
  writeDestination,
} from '@infra-connectors/connector-runtime';

/**
 * What a session borrows from the connector that opened it.
 */
export interface InstanceSessionContext {
  cli: string;
  shell: UnixShell;
  executor: CommandExecutor;
  ui: ConnectorUI;
  logger: ConnectorLogger;
  quote: ShellQuoter;
  tempDir?: string;
}

export class InstanceSession implements TargetSession {
  private readonly logger: ConnectorLogger;

  constructor(
    readonly identifier: string,
    private readonly context: InstanceSessionContext,
    private readonly data: ConnectorData = {}
  ) {
    this.logger = context.logger.child({ target: identifier });
  }

  /**
   * Run `command` inside the instance. The executor's result is returned
   * as is; a non-zero exit is not an error here.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const data = mergeConnectorData(
      this.data,
      options.data === undefined ? undefined : parseConnectorData(options.data)
    );
    const composed = makeUnixCommand(command, data, {
      shell: this.context.shell,
      quote: this.context.quote,
    });

    return this.context.executor.run(
      {
        command: this.context.cli,
        args: ['exec', options.getPty ? '-t' : '-T', this.identifier, '--', this.context.shell, '-c', composed],
      },
      {
        printOutput: options.printOutput,
        printInput: options.printInput,
        timeoutMs: options.timeoutMs,
      }
    );
  }

  /**
   * Push a local file, bytes or stream to `destination` in the instance.
   * Anything but an existing regular file is staged first.
   */
  async upload(source: TransferSource, destination: string, options: TransferOptions = {}): Promise<boolean> {
    const localFile = await resolveLocalFile(source);

    const result =
      localFile !== undefined
        ? await this.push(localFile, destination, options)
        : await withTempFile(
            async (stagingPath) => {
              await writeDestination(stagingPath, await readSource(source));
              return this.push(stagingPath, destination, options);
            },
            { dir: this.context.tempDir }
          );

    if (!result.success) {
      this.logger.warn('Upload failed', { path: destination, exitCode: result.exitCode });
      throw new TransferFailureError(result.stderr, { target: this.identifier, path: destination });
    }

    if (options.printOutput) {
      this.context.ui.info(`[${this.identifier}] file uploaded to instance: ${destination}`);
    }
    this.logger.debug('Uploaded file', { path: destination, staged: localFile === undefined });
    return true;
  }

  /**
   * Pull `source` from the instance into a local path or open stream.
   * The destination is only written once the pull succeeded.
   */
  async download(source: string, destination: TransferDestination, options: TransferOptions = {}): Promise<boolean> {
    await withTempFile(
      async (stagingPath) => {
        const result = await this.context.executor.run(
          {
            command: this.context.cli,
            args: ['file', 'pull', `${this.identifier}/${source.replace(/^\/+/, '')}`, stagingPath],
          },
          { printOutput: options.printOutput, printInput: options.printInput }
        );

        if (!result.success) {
          this.logger.warn('Download failed', { path: source, exitCode: result.exitCode });
          throw new TransferFailureError(result.stderr, { target: this.identifier, path: source });
        }

        await writeDestination(destination, await readFile(stagingPath));
      },
      { dir: this.context.tempDir }
    );

    if (options.printOutput) {
      this.context.ui.info(`[${this.identifier}] file downloaded from instance: ${source}`);
    }
    this.logger.debug('Downloaded file', { path: source });
    return true;
  }

  private push(localPath: string, destination: string, options: TransferOptions): Promise<CommandResult> {
    return this.context.executor.run(
      {
        command: this.context.cli,
        args: ['file', 'push', localPath, `${this.identifier}/${destination}`],
      },
      { printOutput: options.printOutput, printInput: options.printInput }
    );
  }
}
