import { ENV_FILE, RequiredVariable } from './config';
import { LaunchError, LaunchErrorCode } from './errors';

export interface VariablePreview {
    label: string;
    preview: string;
}

/** First `length` code points of the value; never the full secret once it is longer. */
export function maskValue(value: string, length: number): string {
    return Array.from(value).slice(0, Math.max(0, length)).join('');
}

/**
 * Checks every rule against the environment, stopping at the first failure.
 * Returns the masked previews to print on success.
 */
export function validateEnvironment(
    env: Record<string, string>,
    rules: readonly RequiredVariable[],
    options: { strict?: boolean; envFile?: string } = {}
): VariablePreview[] {
    const { strict = false, envFile = ENV_FILE } = options;

    for (const rule of rules) {
        // Name-only rules test the literal key, which is never empty
        const subject = rule.checkValue || strict ? env[rule.key] ?? '' : rule.key;
        if (subject.length === 0) {
            throw new LaunchError(LaunchErrorCode.VARIABLE_MISSING, `${rule.label} is not set!`, {
                hint: `Please set ${rule.label} in your ${envFile} file`,
                context: { key: rule.key }
            });
        }
    }

    return rules.map((rule) => ({
        label: rule.label,
        preview: maskValue(env[rule.key] ?? '', rule.previewLength)
    }));
}
