import { launchDeployment } from './deployment/deploy';

export interface RunOptions {
    cwd?: string;
    launch?: typeof launchDeployment;
}

/**
 * CLI wiring: every argument belongs to the deployment tool, nothing is parsed here.
 * Resolves with the exit code; unexpected failures are printed and become 1.
 */
export async function run(argv: readonly string[], env: NodeJS.ProcessEnv, options: RunOptions = {}): Promise<number> {
    const { cwd = process.cwd(), launch = launchDeployment } = options;

    try {
        return await launch({
            rootPath: cwd,
            args: argv,
            parentEnv: env,
            strict: env.DEPLOY_LAUNCHER_STRICT === '1'
        });
    } catch (error) {
        console.error(error);
        return 1;
    }
}
