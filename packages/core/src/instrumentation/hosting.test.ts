import { describe, test, expect } from 'vitest';
import { detectHosting, isSuspendingHost } from './hosting.js';

describe('detectHosting', () => {
    test('falls back to generic', () => {
        expect(detectHosting({})).toEqual({ type: 'app_hosting.generic', name: 'generic' });
    });

    test('recognizes AWS Lambda by its runtime API', () => {
        expect(
            detectHosting({ AWS_LAMBDA_RUNTIME_API: '127.0.0.1:9001', AWS_LAMBDA_FUNCTION_NAME: 'orders' })
        ).toEqual({ type: 'app_hosting.aws_lambda', name: 'orders' });
    });

    test('Azure Functions win over the App Service variables they also set', () => {
        expect(
            detectHosting({ WEBSITE_SITE_NAME: 'billing', FUNCTIONS_WORKER_RUNTIME: 'node' })
        ).toEqual({ type: 'app_hosting.azure_func', name: 'billing' });
    });

    test('a platform without its name variable reports generic as name', () => {
        expect(detectHosting({ CODESPACES: 'true' })).toEqual({
            type: 'app_hosting.github_codespace',
            name: 'generic',
        });
    });
});

describe('isSuspendingHost', () => {
    test('is true on serverless function hosts only', () => {
        expect(isSuspendingHost({ AWS_LAMBDA_RUNTIME_API: 'x' })).toBe(true);
        expect(isSuspendingHost({ FUNCTIONS_WORKER_RUNTIME: 'node' })).toBe(true);
        expect(isSuspendingHost({ K_SERVICE: 'api' })).toBe(false);
    });
});
