import { describe, expect, it } from 'vitest';
import { AssetError, isAssetError } from '../asset-error';


describe('asset error', () => {

    it('appends the file path to the message', () => {
        const error = new AssetError('NotFound', 'Model file not found', 'common/allsh.prm');

        expect(error.message).toBe('Model file not found (common/allsh.prm)');
        expect(error.name).toBe('AssetError');
    });

    it('adds a path only once', () => {
        const error = new AssetError('MalformedHeader', 'Bad header').withPath('a.prm').withPath('b.prm');

        expect(error.kind).toBe('MalformedHeader');
        expect(error.path).toBe('a.prm');
        expect(error.message).toBe('Bad header (a.prm)');
    });

    it('narrows unknown errors by kind', () => {
        const error: unknown = new AssetError('SizeMismatch', 'Sizes differ');

        expect(isAssetError(error)).toBe(true);
        expect(isAssetError(error, 'SizeMismatch')).toBe(true);
        expect(isAssetError(error, 'NotFound')).toBe(false);
        expect(isAssetError(new Error('Sizes differ'))).toBe(false);
    });

});
