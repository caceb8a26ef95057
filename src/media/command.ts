import { spawnSync } from 'child_process';

export type CommandResult = {
  status: number | null;
  stdout: string;
  stderr: string;
  error?: Error;
};

/** 외부 명령 실행기. 테스트에서는 가짜 runner를 넘긴다 */
export type CommandRunner = (command: string, args: string[]) => CommandResult;

export const runCommand: CommandRunner = (command, args) => {
  const result = spawnSync(command, args, { encoding: 'utf-8' });
  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    ...(result.error ? { error: result.error } : {}),
  };
};
