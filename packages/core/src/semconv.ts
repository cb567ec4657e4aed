/**
 * Attribute and baggage keys written by the SDK
 */

export const ATTR_SDK_VERSION = 'callscope.sdk.version';
export const ATTR_SDK_LANGUAGE = 'callscope.sdk.language';
export const ATTR_SPAN_TYPE = 'span.type';
export const ATTR_SPAN_SUBTYPE = 'span.subtype';
export const ATTR_WORKFLOW_NAME = 'workflow.name';
export const ATTR_DETECTED_ERROR = 'callscope.detected_error';

/** Primary entity of a span: the workflow on root spans, the agent on agent spans */
export const ATTR_ENTITY_NAME = 'entity.1.name';
export const ATTR_ENTITY_TYPE = 'entity.1.type';
/** Hosting environment entity on root spans */
export const ATTR_HOSTING_ENTITY_TYPE = 'entity.2.type';
export const ATTR_HOSTING_ENTITY_NAME = 'entity.2.name';

export const ATTR_LAST_AGENT_NAME = 'agentic.last_agent.name';
export const ATTR_LAST_AGENT_SPAN_ID = 'agentic.last_agent.span_id';
export const AGENT_INVOCATION_SPAN_TYPE = 'agentic.invocation';

/** Every active scope is rendered as scope.<name> */
export const SCOPE_ATTRIBUTE_PREFIX = 'scope.';
/** Baggage entries holding scopes */
export const SCOPE_BAGGAGE_PREFIX = 'callscope.scope.';

export const WORKFLOW_TYPE_GENERIC = 'workflow.generic';
