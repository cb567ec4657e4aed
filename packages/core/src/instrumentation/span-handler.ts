import { SpanStatusCode } from '@opentelemetry/api';
import type { AttributeValue, Attributes, Context, Span, TimeInput } from '@opentelemetry/api';
import { Span as SdkSpan } from '@opentelemetry/sdk-trace-base';
import { ContextToken, getContextRuntime } from '../context/context-runtime.js';
import { getScopes } from '../context/scopes.js';
import type { Logger } from '../logger/types.js';
import { LogComponent } from '../logger/types.js';
import { getDefaultLogger } from '../logger/factory.js';
import {
    AGENT_INVOCATION_SPAN_TYPE,
    ATTR_DETECTED_ERROR,
    ATTR_ENTITY_NAME,
    ATTR_ENTITY_TYPE,
    ATTR_HOSTING_ENTITY_NAME,
    ATTR_HOSTING_ENTITY_TYPE,
    ATTR_LAST_AGENT_NAME,
    ATTR_LAST_AGENT_SPAN_ID,
    ATTR_SDK_LANGUAGE,
    ATTR_SDK_VERSION,
    ATTR_SPAN_SUBTYPE,
    ATTR_SPAN_TYPE,
    ATTR_WORKFLOW_NAME,
    SCOPE_ATTRIBUTE_PREFIX,
    WORKFLOW_TYPE_GENERIC,
} from '../semconv.js';
import { SDK_LANGUAGE, SDK_VERSION } from '../version.js';
import { detectHosting } from './hosting.js';
import type {
    AccessorInput,
    AccessorOutput,
    AttributeRule,
    CallDetails,
    SpanPhase,
    SpanResolver,
} from './types.js';

/**
 * Thrown by an accessor to mark the span as failed while the call itself succeeded,
 * e.g. a response body carrying an error payload.
 */
export class SpanStatusError extends Error {
    constructor(
        message: string,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'SpanStatusError';
    }
}

/**
 * Events collected during hydration. Same-name events merge; they are written to the span in
 * first-seen order right before it ends.
 */
export class SpanEventBuffer {
    private readonly events = new Map<string, { attributes: Attributes; time: TimeInput }>();

    merge(name: string, attributes: Attributes, time: TimeInput = new Date()): void {
        const existing = this.events.get(name);
        if (existing) {
            Object.assign(existing.attributes, attributes);
            return;
        }
        this.events.set(name, { attributes: { ...attributes }, time });
    }

    get size(): number {
        return this.events.size;
    }

    flush(span: Span): void {
        for (const [name, event] of this.events) {
            span.addEvent(name, event.attributes, event.time);
        }
        this.events.clear();
    }
}

export interface PreTracingResult {
    /** Handed back to postTracing */
    token?: unknown;
    /** Replaces the MethodSpec resolver for this call */
    resolver?: SpanResolver;
}

export interface DefaultAttributesInput {
    readonly call: CallDetails;
    readonly resolver?: SpanResolver | undefined;
    /** Context the span was started in */
    readonly parentContext: Context;
    readonly isRoot: boolean;
    readonly serviceName: string;
}

export interface HydrationInput {
    readonly span: Span;
    readonly parentSpan?: Span | undefined;
    readonly resolver?: SpanResolver | undefined;
    readonly result?: unknown;
    readonly error?: unknown;
    readonly events: SpanEventBuffer;
}

export interface CallOutcome {
    readonly result?: unknown;
    readonly error?: unknown;
}

/**
 * Active scopes of ctx rendered as `scope.<name>` attributes
 */
export function scopeAttributes(ctx: Context): Attributes {
    const attributes: Attributes = {};
    for (const [name, value] of Object.entries(getScopes(ctx))) {
        attributes[SCOPE_ATTRIBUTE_PREFIX + name] = value;
    }
    return attributes;
}

function isAttributeValue(value: AccessorOutput): value is AttributeValue {
    return (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'boolean' ||
        Array.isArray(value)
    );
}

/**
 * Hooks around every intercepted call. Subclass and override to adapt a library; the lifecycle
 * guards every hook so a failing override is logged and never reaches the caller.
 */
export class SpanHandler {
    protected readonly logger: Logger;

    constructor(logger: Logger = getDefaultLogger()) {
        this.logger = logger.createChild(LogComponent.INSTRUMENTATION);
    }

    preTracing(_call: CallDetails): PreTracingResult | undefined {
        return undefined;
    }

    /**
     * Releases whatever preTracing attached. Context tokens are detached by default.
     */
    postTracing(_call: CallDetails, _result: unknown, token: unknown): void {
        if (token instanceof ContextToken) {
            getContextRuntime().detach(token);
        }
    }

    skipSpan(_call: CallDetails): boolean {
        return false;
    }

    setDefaultAttributes(span: Span, input: DefaultAttributesInput): void {
        span.setAttributes({
            [ATTR_SDK_VERSION]: SDK_VERSION,
            [ATTR_SDK_LANGUAGE]: SDK_LANGUAGE,
            [ATTR_WORKFLOW_NAME]: input.serviceName,
            [ATTR_SPAN_TYPE]: input.resolver?.type ?? 'generic',
        });
        if (input.resolver?.subtype) {
            span.setAttribute(ATTR_SPAN_SUBTYPE, input.resolver.subtype);
        }

        span.setAttributes(scopeAttributes(input.parentContext));

        if (input.isRoot) {
            const hosting = detectHosting();
            span.setAttributes({
                [ATTR_ENTITY_NAME]: input.serviceName,
                [ATTR_ENTITY_TYPE]: WORKFLOW_TYPE_GENERIC,
                [ATTR_HOSTING_ENTITY_TYPE]: hosting.type,
                [ATTR_HOSTING_ENTITY_NAME]: hosting.name,
            });
        }
    }

    /**
     * Applies the resolver rules of one phase. Returns true when an accessor flagged an error
     * through SpanStatusError.
     */
    hydrateSpan(call: CallDetails, phase: SpanPhase, input: HydrationInput): boolean {
        const resolver = input.resolver;
        if (!resolver) {
            return false;
        }

        const accessorInput: AccessorInput =
            phase === 'post_execution'
                ? {
                      instance: call.instance,
                      args: call.args,
                      result: input.result,
                      error: input.error,
                      span: input.span,
                      parentSpan: input.parentSpan,
                  }
                : {
                      instance: call.instance,
                      args: call.args,
                      span: input.span,
                      parentSpan: input.parentSpan,
                  };

        let detectedError = false;
        for (const rule of resolver.attributes ?? []) {
            if ((rule.phase ?? 'post_execution') !== phase) {
                continue;
            }
            const evaluated = this.evaluate(call, rule, accessorInput);
            detectedError = detectedError || evaluated.detectedError;
            input.span.setAttributes(evaluated.attributes);
        }

        if (phase === 'post_execution') {
            for (const event of resolver.events ?? []) {
                const attributes: Attributes = {};
                for (const rule of event.attributes) {
                    const evaluated = this.evaluate(call, rule, accessorInput);
                    detectedError = detectedError || evaluated.detectedError;
                    Object.assign(attributes, evaluated.attributes);
                }
                input.events.merge(event.name, attributes);
            }
        }

        return detectedError;
    }

    /**
     * Cross-span adjustments once the call finished. By default an agent invocation reports its
     * agent name and span id to its parent.
     */
    postTaskProcessing(
        span: Span,
        parentSpan: Span | undefined,
        _call: CallDetails,
        _outcome: CallOutcome
    ): void {
        if (!parentSpan || !(span instanceof SdkSpan)) {
            return;
        }
        if (span.attributes[ATTR_SPAN_TYPE] !== AGENT_INVOCATION_SPAN_TYPE) {
            return;
        }
        parentSpan.setAttribute(ATTR_LAST_AGENT_SPAN_ID, span.spanContext().spanId);
        const agentName = span.attributes[ATTR_ENTITY_NAME];
        if (agentName !== undefined) {
            parentSpan.setAttribute(ATTR_LAST_AGENT_NAME, agentName);
        }
    }

    private evaluate(
        call: CallDetails,
        rule: AttributeRule,
        input: AccessorInput
    ): { attributes: Attributes; detectedError: boolean } {
        try {
            const attributes = toAttributes(rule.attribute, rule.accessor(input));
            return { attributes, detectedError: false };
        } catch (error) {
            if (error instanceof SpanStatusError) {
                input.span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
                input.span.setAttribute(ATTR_DETECTED_ERROR, true);
                const attributes: Attributes =
                    rule.attribute && error.code !== undefined ? { [rule.attribute]: error.code } : {};
                return { attributes, detectedError: true };
            }
            this.logger.debug(`Attribute accessor failed for '${rule.attribute ?? '*'}'`, {
                method: call.name,
                error: error instanceof Error ? error.message : String(error),
            });
            return { attributes: {}, detectedError: false };
        }
    }
}

function toAttributes(name: string | undefined, output: AccessorOutput): Attributes {
    if (output === null || output === undefined) {
        return {};
    }
    if (isAttributeValue(output)) {
        return name ? { [name]: output } : {};
    }
    const attributes: Attributes = {};
    for (const [key, value] of Object.entries(output)) {
        if (value !== null && value !== undefined) {
            attributes[name ? `${name}.${key}` : key] = value;
        }
    }
    return attributes;
}
