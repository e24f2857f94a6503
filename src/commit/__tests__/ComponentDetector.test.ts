import { detectComponents, extractComponent } from '../ComponentDetector';

describe('extractComponent', () => {
    it('skips conventional root directories', () => {
        expect(extractComponent('src/auth/login.ts')).toBe('auth');
        expect(extractComponent('internal/cache/lru.go')).toBe('cache');
    });

    it('uses the first directory otherwise', () => {
        expect(extractComponent('billing/invoice/pdf.ts')).toBe('billing');
    });

    it('accepts backslash separators', () => {
        expect(extractComponent('src\\orders\\cart.cs')).toBe('orders');
    });

    it('falls back to the file stem when the root holds the file directly', () => {
        expect(extractComponent('src/main.ts')).toBe('main');
        expect(extractComponent('setup.py')).toBe('setup');
    });

    it('ignores dot segments', () => {
        expect(extractComponent('./scripts/release.sh')).toBe('scripts');
    });
});

describe('detectComponents', () => {
    it('groups paths in first-seen order', () => {
        const components = detectComponents([
            'src/users/model.ts',
            'src/orders/cart.ts',
            'src/users/service.ts',
        ]);

        expect([...components.entries()]).toEqual([
            ['users', ['src/users/model.ts', 'src/users/service.ts']],
            ['orders', ['src/orders/cart.ts']],
        ]);
    });
});
