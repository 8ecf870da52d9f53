/**
 * Unit tests for the persister
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { imagePath, saveImage } from '../save.js';
import { IOError } from '../../errors.js';

describe('saveImage', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'identicon-save-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should write <name>.png into the output directory', async () => {
        const path = await saveImage(Buffer.from([1, 2, 3]), 'example', { outputDir: dir });

        expect(path).toBe(join(dir, 'example.png'));
        expect(Array.from(await readFile(path))).toEqual([1, 2, 3]);
    });

    it('should overwrite an existing file with the same name', async () => {
        await saveImage(Buffer.from([1, 2, 3, 4]), 'twice', { outputDir: dir });
        const path = await saveImage(Buffer.from([9]), 'twice', { outputDir: dir });

        expect(Array.from(await readFile(path))).toEqual([9]);
    });

    it('should throw IOError when the directory does not exist', async () => {
        const missing = join(dir, 'missing');

        await expect(saveImage(Buffer.from([1]), 'nope', { outputDir: missing })).rejects.toBeInstanceOf(IOError);
        await expect(saveImage(Buffer.from([1]), 'nope', { outputDir: missing })).rejects.toMatchObject({
            code: 'ERROR-ID-02',
            path: join(missing, 'nope.png'),
        });
    });

    it('should keep the underlying error as cause', async () => {
        const missing = join(dir, 'missing');
        try {
            await saveImage(Buffer.from([1]), 'nope', { outputDir: missing });
            expect.fail('saveImage should have thrown');
        } catch (error) {
            expect(error).toBeInstanceOf(IOError);
            if (error instanceof IOError) {
                expect(error.cause).toMatchObject({ code: 'ENOENT' });
                expect(error.message.startsWith(`ERROR-ID-02: Failed to write ${join(missing, 'nope.png')}: `)).toBe(true);
            }
        }
    });

    describe('imagePath', () => {
        it('should resolve relative names against the output directory', () => {
            expect(imagePath('alice', '/tmp/out')).toBe('/tmp/out/alice.png');
        });

        it('should keep absolute names as they are', () => {
            expect(imagePath('/var/avatars/bob', '/tmp/out')).toBe('/var/avatars/bob.png');
        });
    });
});
