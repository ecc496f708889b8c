import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isWithinRoot, percentDecode, resolveTarget } from '../path_resolver';
import { EncodingError } from '../types';

describe('percentDecode', () => {
    it('decodes %XX triples in either case', () => {
        expect(percentDecode('/a%20b%2fc%2F').toString('latin1')).toBe('/a b/c/');
    });

    it('copies a lone percent through', () => {
        expect(percentDecode('100%').toString('latin1')).toBe('100%');
        expect(percentDecode('%').toString('latin1')).toBe('%');
    });

    it('copies a percent with fewer than two hex digits after it', () => {
        expect(percentDecode('/a%2').toString('latin1')).toBe('/a%2');
        expect(percentDecode('/%zz/%4g').toString('latin1')).toBe('/%zz/%4g');
    });

    it('produces raw bytes for multi-byte UTF-8 sequences', () => {
        expect([...percentDecode('%C3%A9')]).toEqual([0xc3, 0xa9]);
    });

    it('reverses encodeURIComponent on a path segment', () => {
        const segment = 'résumé & notes #1.txt';
        expect(percentDecode(encodeURIComponent(segment)).toString('utf8')).toBe(segment);
    });
});

describe('isWithinRoot', () => {
    const root = path.resolve('/srv/files');

    it('accepts the root and its descendants', () => {
        expect(isWithinRoot(root, root)).toBe(true);
        expect(isWithinRoot(root, path.join(root, 'a', 'b.txt'))).toBe(true);
        expect(isWithinRoot(root, path.join(root, '..hidden'))).toBe(true);
    });

    it('rejects locations outside the root', () => {
        expect(isWithinRoot(root, path.resolve('/srv'))).toBe(false);
        expect(isWithinRoot(root, path.resolve('/srv/other/file'))).toBe(false);
    });
});

describe('resolveTarget', () => {
    let root: string;

    beforeAll(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'resolver-'));
        fs.mkdirSync(path.join(root, 'docs'));
        fs.writeFileSync(path.join(root, 'a b.txt'), 'spaced');
        fs.writeFileSync(path.join(root, 'docs', 'café.md'), 'accented');
        fs.writeFileSync(path.join(path.dirname(root), `${path.basename(root)}-outside.txt`), 'outside');
    });

    afterAll(() => {
        fs.rmSync(root, { recursive: true, force: true });
        fs.rmSync(path.join(path.dirname(root), `${path.basename(root)}-outside.txt`), { force: true });
    });

    it('resolves / to the root directory', async () => {
        const target = await resolveTarget('/', root);
        expect(target).toEqual({ decodedPath: '/', location: root, classification: 'directory' });
    });

    it('classifies a subdirectory', async () => {
        const target = await resolveTarget('/docs', root);
        expect(target.location).toBe(path.join(root, 'docs'));
        expect(target.classification).toBe('directory');
    });

    it('resolves an encoded name to the same file as the literal one', async () => {
        const encoded = await resolveTarget('/a%20b.txt', root);
        const literal = await resolveTarget('/a b.txt', root);
        expect(encoded.classification).toBe('file');
        expect(encoded.location).toBe(literal.location);
        expect(encoded.decodedPath).toBe('/a b.txt');
    });

    it('decodes UTF-8 names', async () => {
        const target = await resolveTarget('/docs/caf%C3%A9.md', root);
        expect(target.decodedPath).toBe('/docs/café.md');
        expect(target.classification).toBe('file');
    });

    it('classifies a missing path as not-found', async () => {
        expect((await resolveTarget('/missing.txt', root)).classification).toBe('not-found');
    });

    it('treats a path that climbs out of the root as not-found', async () => {
        const escape = `/../${path.basename(root)}-outside.txt`;
        const target = await resolveTarget(escape, root);
        expect(target.classification).toBe('not-found');
    });

    it('treats an encoded parent segment the same way', async () => {
        const target = await resolveTarget(`/%2e%2e/${path.basename(root)}-outside.txt`, root);
        expect(target.classification).toBe('not-found');
    });

    it('keeps parent segments that stay inside the root', async () => {
        const target = await resolveTarget('/docs/../a%20b.txt', root);
        expect(target.location).toBe(path.join(root, 'a b.txt'));
        expect(target.classification).toBe('file');
    });

    it('rejects decoded bytes that are not UTF-8', async () => {
        await expect(resolveTarget('/%FF%FE', root)).rejects.toBeInstanceOf(EncodingError);
    });
});
