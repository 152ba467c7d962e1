import path from 'path';
import { capture } from '../utils/exec.js';
import type { CommandSpec, ExecResult } from '../utils/exec.js';
import { isDirectory, isExecutableFile, pathExists, readTextFile } from '../utils/fs.js';

/** Read-only questions about the host. Nothing here mutates anything. */
export type CapabilityProbe = {
  hasCommand(name: string): Promise<boolean>;
  exists(p: string): Promise<boolean>;
  isDirectory(p: string): Promise<boolean>;
  isExecutable(p: string): Promise<boolean>;
  readFile(p: string): Promise<string | null>;
  /** Run a query command such as `rpm -q zsh`. */
  query(cmd: CommandSpec): Promise<ExecResult>;
};

export function createHostProbe(searchPath: string): CapabilityProbe {
  const dirs = searchPath.split(path.delimiter).filter(Boolean);
  return {
    async hasCommand(name) {
      for (const dir of dirs) {
        if (await isExecutableFile(path.join(dir, name))) return true;
      }
      return false;
    },
    exists: pathExists,
    isDirectory,
    isExecutable: isExecutableFile,
    readFile: readTextFile,
    query: capture,
  };
}

export async function querySucceeds(probe: CapabilityProbe, cmd: CommandSpec): Promise<boolean> {
  const result = await probe.query(cmd);
  return result.exitCode === 0;
}
