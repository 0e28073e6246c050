import { LauncherConfig, ToolRunner, resolveConfig } from './config';
import { LaunchError } from './errors';
import { buildChildEnvironment, loadEnvironmentFile } from './env';
import { validateEnvironment } from './validate';
import { createReporter, Reporter } from './reporter';
import { resolveArguments, spawnTool } from './runner';

export interface LaunchOptions extends Partial<LauncherConfig> {
    rootPath: string;
    args: readonly string[];
    parentEnv?: NodeJS.ProcessEnv;
    reporter?: Reporter;
    runTool?: ToolRunner;
}

/**
 * Main entry point: prepares the environment and hands off to the deployment tool.
 *
 * Flow:
 * 1. Require the env file
 * 2. Load it over the parent environment
 * 3. Check required variables
 * 4. Print masked previews
 * 5. Run the tool with the forwarded (or default) arguments
 *
 * Resolves with the process exit code: 1 for a failed precondition, otherwise the tool's.
 */
export async function launchDeployment(options: LaunchOptions): Promise<number> {
    const { args, parentEnv = process.env, reporter = createReporter(), runTool = spawnTool, ...overrides } = options;
    const config = resolveConfig(overrides);

    reporter.banner('Kamal Deployment');

    try {
        const fileEnv = await loadEnvironmentFile(config.rootPath, config.envFile);
        reporter.progress(`Loading environment variables from ${config.envFile}...`);
        const env = buildChildEnvironment(fileEnv, parentEnv);

        const previews = validateEnvironment(env, config.requiredVariables, {
            strict: config.strict,
            envFile: config.envFile
        });

        reporter.success('Environment loaded successfully');
        for (const { label, preview } of previews) {
            reporter.success(`${label}: ${preview}...`);
        }
        reporter.blank();

        const toolArgs = resolveArguments(args, config.defaultCommand);
        reporter.progress(`Running: ${config.tool} ${toolArgs.join(' ')}`);
        reporter.blank();

        return await runTool({
            command: config.tool,
            args: toolArgs,
            cwd: config.rootPath,
            env
        });
    } catch (error) {
        if (error instanceof LaunchError) {
            reporter.error(error.message, error.hint);
            return error.exitCode;
        }
        throw error;
    }
}
