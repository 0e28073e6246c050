import chalk from 'chalk';

export interface Reporter {
    banner(text: string): void;
    progress(text: string): void;
    success(text: string): void;
    error(text: string, hint?: string): void;
    blank(): void;
}

export interface ReporterOptions {
    colors?: chalk.Chalk;
    out?: (line: string) => void;
    err?: (line: string) => void;
}

/**
 * Console output for the launcher: green for banners and confirmations,
 * yellow for progress, red for failures (on stderr).
 */
export function createReporter(options: ReporterOptions = {}): Reporter {
    const colors = options.colors ?? chalk;
    const out = options.out ?? ((line: string) => console.log(line));
    const err = options.err ?? ((line: string) => console.error(line));

    return {
        banner: (text) => out(colors.green(`=== ${text} ===`)),
        progress: (text) => out(colors.yellow(text)),
        success: (text) => out(colors.green(`✓ ${text}`)),
        error: (text, hint) => {
            err(colors.red(`ERROR: ${text}`));
            if (hint) err(hint);
        },
        blank: () => out('')
    };
}
