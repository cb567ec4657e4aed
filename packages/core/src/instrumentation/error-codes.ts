/**
 * Instrumentation error codes
 * Covers target resolution and proxy installation
 */
export enum InstrumentationErrorCode {
    MODULE_NOT_FOUND = 'instrumentation_module_not_found',
    OBJECT_NOT_FOUND = 'instrumentation_object_not_found',
    METHOD_NOT_FOUND = 'instrumentation_method_not_found',
    ALREADY_INSTRUMENTED = 'instrumentation_already_instrumented',
    HANDLER_NOT_FOUND = 'instrumentation_handler_not_found',
    INVALID_LOCATION = 'instrumentation_invalid_location',
}
