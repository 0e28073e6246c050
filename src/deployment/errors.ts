export enum LaunchErrorCode {
    ENV_FILE_MISSING = 'ENV_FILE_MISSING',
    VARIABLE_MISSING = 'VARIABLE_MISSING',
    TOOL_NOT_FOUND = 'TOOL_NOT_FOUND',
    TOOL_NOT_EXECUTABLE = 'TOOL_NOT_EXECUTABLE'
}

export class LaunchError extends Error {
    readonly code: LaunchErrorCode;
    readonly exitCode: number;
    readonly hint?: string;
    readonly context?: Record<string, unknown>;

    constructor(
        code: LaunchErrorCode,
        message: string,
        options: { exitCode?: number; hint?: string; context?: Record<string, unknown> } = {}
    ) {
        super(message);
        this.name = 'LaunchError';
        this.code = code;
        this.exitCode = options.exitCode ?? 1;
        this.hint = options.hint;
        this.context = options.context;
    }
}
