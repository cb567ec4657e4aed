// Keep in sync with packages/core/package.json
export const SDK_VERSION = '0.1.0';
export const SDK_LANGUAGE = 'typescript';
export const INSTRUMENTATION_SCOPE_NAME = '@callscope/core';
