import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import prompts from 'prompts';
import { CliError, confirmOverwrite } from '../src/index.js';
import { captureAsyncError } from '../../../test/helpers/errors.js';

vi.mock('prompts', () => ({ default: vi.fn() }));

describe('confirmOverwrite', () => {
    let dir: string;
    let existing: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'pageforge-output-'));
        existing = join(dir, 'page.html');
        await writeFile(existing, 'old');
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    afterEach(() => {
        vi.mocked(prompts).mockReset();
    });

    it('should allow a new file without asking', async () => {
        await confirmOverwrite(join(dir, 'new.html'), { interactive: true });

        expect(prompts).not.toHaveBeenCalled();
    });

    it('should allow an existing file with overwrite', async () => {
        await confirmOverwrite(existing, { overwrite: true, interactive: true });

        expect(prompts).not.toHaveBeenCalled();
    });

    it('should refuse an existing file when it cannot ask', async () => {
        const error = await captureAsyncError(
            confirmOverwrite(existing, { interactive: false }),
        );

        expect(error).toBeInstanceOf(CliError);
        expect(error).toMatchObject({
            message: `Output file '${existing}' already exists`,
            hint: 'Pass --overwrite to replace it',
        });
    });

    it('should proceed when the user confirms', async () => {
        vi.mocked(prompts).mockResolvedValue({ overwrite: true });

        await confirmOverwrite(existing, { interactive: true });

        expect(prompts).toHaveBeenCalledWith({
            type: 'confirm',
            name: 'overwrite',
            message: `Output file '${existing}' already exists. Overwrite?`,
            initial: false,
        });
    });

    it('should cancel when the user declines or aborts', async () => {
        for (const answer of [{ overwrite: false }, {}]) {
            vi.mocked(prompts).mockResolvedValue(answer);

            const error = await captureAsyncError(
                confirmOverwrite(existing, { interactive: true }),
            );

            expect(error).toMatchObject({ message: 'Operation cancelled.' });
        }
    });
});
