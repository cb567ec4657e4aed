import { StorageError } from '@callscope/core';

/**
 * Keys are '/'-separated relative paths. Rejects anything that could escape the store root.
 */
export function assertValidKey(key: string): void {
    if (key.length === 0) {
        throw StorageError.invalidKey(key, 'key is empty');
    }
    if (key.startsWith('/') || key.includes('\\') || /^[a-zA-Z]:/.test(key)) {
        throw StorageError.invalidKey(key, 'key must be a relative path using "/" separators');
    }
    const segments = key.split('/');
    if (segments.some((segment) => segment === '' || segment === '.' || segment === '..')) {
        throw StorageError.invalidKey(key, 'key contains an empty, "." or ".." segment');
    }
}
