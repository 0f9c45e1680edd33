import { execFile } from "child_process";
import { promisify } from "util";

const execFileAsync = promisify(execFile);

export type ExecFileFn = (file: string, args: string[]) => Promise<{ stdout: string; stderr: string }>;

export const defaultExecFile: ExecFileFn = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, args, { maxBuffer: 64 * 1024 * 1024 });
  return { stdout, stderr };
};

export const parseCommandLine = (commandLine: string, name = "MIGRATE_COMMAND"): { file: string; args: string[] } => {
  const [file, ...args] = commandLine.trim().split(/\s+/).filter((part) => part !== "");
  if (!file) {
    throw new Error(`${name} must not be empty`);
  }
  return { file, args };
};
