/**
 * Context and scope error codes
 */
export enum ContextErrorCode {
    SCOPE_NAME_INVALID = 'context_scope_name_invalid',
    CARRIER_INVALID = 'context_carrier_invalid',
}
