import fs from 'fs-extra';
import path from 'path';
import dotenv from 'dotenv';
import { LaunchError, LaunchErrorCode } from './errors';

/**
 * Reads the environment file from the project root.
 * Later assignments of the same key win. Throws unless the path is a regular file.
 */
export async function loadEnvironmentFile(rootPath: string, envFile: string): Promise<Record<string, string>> {
    const envPath = path.resolve(rootPath, envFile);

    // Like `test -f`: a failed stat or a directory counts as missing
    const isFile = await fs.stat(envPath).then((stats) => stats.isFile(), () => false);
    if (!isFile) {
        throw new LaunchError(LaunchErrorCode.ENV_FILE_MISSING, `${envFile} file not found!`, {
            hint: `Please create ${envFile} file with all required variables`,
            context: { envPath }
        });
    }

    const envContent = await fs.readFile(envPath, 'utf-8');
    return dotenv.parse(envContent);
}

/**
 * Builds the environment handed to the tool: the parent's variables with the file's on top.
 * The parent environment is left untouched.
 */
export function buildChildEnvironment(
    fileEnv: Record<string, string>,
    parentEnv: NodeJS.ProcessEnv = process.env
): Record<string, string> {
    const inherited: Record<string, string> = {};
    for (const [key, value] of Object.entries(parentEnv)) {
        if (value !== undefined) {
            inherited[key] = value;
        }
    }

    return { ...inherited, ...fileEnv };
}
