/**
 * Detects the platform hosting the process from well-known environment variables
 */

export interface HostingInfo {
    type: string;
    name: string;
}

interface HostingRule {
    /** Present when running on the platform */
    markerEnv: string;
    type: string;
    /** Holds the deployed app's name */
    nameEnv: string;
}

// Later matches win: Azure Functions also set WEBSITE_SITE_NAME
const HOSTING_RULES: readonly HostingRule[] = [
    { markerEnv: 'AZUREML_ENTRY_SCRIPT', type: 'azure_ml', nameEnv: 'AZUREML_ENTRY_SCRIPT' },
    { markerEnv: 'WEBSITE_SITE_NAME', type: 'azure_webapp', nameEnv: 'WEBSITE_DEPLOYMENT_ID' },
    { markerEnv: 'FUNCTIONS_WORKER_RUNTIME', type: 'azure_func', nameEnv: 'WEBSITE_SITE_NAME' },
    { markerEnv: 'AWS_LAMBDA_RUNTIME_API', type: 'aws_lambda', nameEnv: 'AWS_LAMBDA_FUNCTION_NAME' },
    { markerEnv: 'K_SERVICE', type: 'gcp_cloud_run', nameEnv: 'K_SERVICE' },
    { markerEnv: 'CODESPACES', type: 'github_codespace', nameEnv: 'GITHUB_REPOSITORY' },
];

export function detectHosting(env: NodeJS.ProcessEnv = process.env): HostingInfo {
    let info: HostingInfo = { type: 'app_hosting.generic', name: 'generic' };
    for (const rule of HOSTING_RULES) {
        if (env[rule.markerEnv] !== undefined) {
            info = { type: `app_hosting.${rule.type}`, name: env[rule.nameEnv] ?? 'generic' };
        }
    }
    return info;
}

/**
 * True on hosts that freeze the process between invocations
 */
export function isSuspendingHost(env: NodeJS.ProcessEnv = process.env): boolean {
    return env['AWS_LAMBDA_RUNTIME_API'] !== undefined || env['FUNCTIONS_WORKER_RUNTIME'] !== undefined;
}
