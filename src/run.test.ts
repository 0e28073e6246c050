import { describe, it, expect, vi, afterEach } from 'vitest';
import { LaunchOptions } from './deployment/deploy';
import { run } from './run';

describe('run', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should forward argv unchanged and resolve with the launch exit code', async () => {
        const launch = vi.fn(async (_options: LaunchOptions) => 7);

        const code = await run(['app', 'exec', 'rails db:migrate'], { PATH: '/usr/bin' }, { cwd: '/srv/app', launch });

        expect(code).toBe(7);
        expect(launch).toHaveBeenCalledWith({
            rootPath: '/srv/app',
            args: ['app', 'exec', 'rails db:migrate'],
            parentEnv: { PATH: '/usr/bin' },
            strict: false
        });
    });

    it('should enable strict checks when DEPLOY_LAUNCHER_STRICT is 1', async () => {
        const launch = vi.fn(async (_options: LaunchOptions) => 0);

        await run([], { DEPLOY_LAUNCHER_STRICT: '1' }, { cwd: '/srv/app', launch });

        expect(launch.mock.calls[0][0].strict).toBe(true);
    });

    it('should leave strict checks off for other values', async () => {
        const launch = vi.fn(async (_options: LaunchOptions) => 0);

        await run([], { DEPLOY_LAUNCHER_STRICT: 'true' }, { cwd: '/srv/app', launch });

        expect(launch.mock.calls[0][0].strict).toBe(false);
    });

    it('should print unexpected failures and resolve with 1', async () => {
        const failure = new Error('spawn EPERM');
        const launch = vi.fn(async (_options: LaunchOptions): Promise<number> => {
            throw failure;
        });
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const code = await run(['deploy'], {}, { cwd: '/srv/app', launch });

        expect(code).toBe(1);
        expect(consoleError).toHaveBeenCalledWith(failure);
    });
});
