export const ENV_FILE = '.env';
export const DEPLOY_TOOL = 'kamal';
export const DEFAULT_COMMAND = 'deploy';

export interface RequiredVariable {
    key: string;
    label: string; // Name shown in messages
    previewLength: number;
    /**
     * When false, the check tests the variable name instead of its value and can never fail.
     * The database rule ships this way to match the launcher it replaces; `strict` overrides it.
     */
    checkValue: boolean;
}

export const REQUIRED_VARIABLES: readonly RequiredVariable[] = [
    {
        // The replaced launcher checked DOVE_KAMAL_REGISTRY_PASSWORD but printed this one; both now use this key
        key: 'KAMAL_REGISTRY_PASSWORD',
        label: 'KAMAL_REGISTRY_PASSWORD',
        previewLength: 10,
        checkValue: true
    },
    {
        key: 'MONGO_DSN',
        label: 'DATABASE_URL',
        previewLength: 20,
        checkValue: false
    }
];

export interface LauncherConfig {
    rootPath: string; // Directory holding the env file, also the tool's cwd
    envFile: string;
    tool: string;
    defaultCommand: string;
    requiredVariables: readonly RequiredVariable[];
    strict: boolean;
}

export interface ToolInvocation {
    command: string;
    args: string[];
    cwd: string;
    env: Record<string, string>;
}

/** Runs the external tool and resolves with the exit code to report. */
export type ToolRunner = (invocation: ToolInvocation) => Promise<number>;

export function resolveConfig(overrides: Partial<LauncherConfig> & { rootPath: string }): LauncherConfig {
    return {
        rootPath: overrides.rootPath,
        envFile: overrides.envFile ?? ENV_FILE,
        tool: overrides.tool ?? DEPLOY_TOOL,
        defaultCommand: overrides.defaultCommand ?? DEFAULT_COMMAND,
        requiredVariables: overrides.requiredVariables ?? REQUIRED_VARIABLES,
        strict: overrides.strict ?? false
    };
}
