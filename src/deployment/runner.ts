import os from 'os';
import spawn from 'cross-spawn';
import { ToolInvocation } from './config';
import { LaunchError, LaunchErrorCode } from './errors';

/** Arguments as given, or the default subcommand when there are none. */
export function resolveArguments(args: readonly string[], defaultCommand: string): string[] {
    return args.length > 0 ? [...args] : [defaultCommand];
}

/** Exit code a POSIX shell reports for a child killed by `signal`. */
export function signalExitCode(signal: NodeJS.Signals): number {
    const signo: unknown = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
    return 128 + (typeof signo === 'number' ? signo : 1);
}

/**
 * Runs the deployment tool in the foreground and resolves with its exit status.
 * The child shares our stdio so interactive prompts and logs pass straight through.
 */
export function spawnTool(invocation: ToolInvocation): Promise<number> {
    const { command, args, cwd, env } = invocation;

    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            cwd,
            stdio: 'inherit',
            env
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
            if (code !== null) resolve(code);
            else if (signal) resolve(signalExitCode(signal));
            else resolve(1);
        });

        child.on('error', (err: NodeJS.ErrnoException) => {
            if (err.code === 'ENOENT') {
                reject(new LaunchError(LaunchErrorCode.TOOL_NOT_FOUND, `${command}: command not found`, {
                    exitCode: 127,
                    context: { command }
                }));
            } else if (err.code === 'EACCES') {
                reject(new LaunchError(LaunchErrorCode.TOOL_NOT_EXECUTABLE, `${command}: Permission denied`, {
                    exitCode: 126,
                    context: { command }
                }));
            } else {
                reject(err);
            }
        });
    });
}
