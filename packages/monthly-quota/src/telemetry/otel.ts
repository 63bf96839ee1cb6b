// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { SpanStatusCode, trace, type Attributes, type Tracer } from '@opentelemetry/api';

/**
 * Configuration for the quota OTel instrumentation.
 */
export interface QuotaTracerConfig {
  /** Tracer used for span creation. Defaults to the global `monthly-quota` tracer. */
  tracer?: Tracer;
  /** Service name attribute added to all spans. Defaults to "monthly-quota". */
  serviceName?: string;
}

/**
 * QuotaTracer wraps quota operations in OpenTelemetry spans.
 *
 * Span names are `quota.<operation>`; attributes live under `quota.*`.
 * Without a registered OTel SDK the global tracer is a no-op.
 *
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const quota = new MonthlyQuota(config, storage, {
 *   tracer: new QuotaTracer({ tracer: trace.getTracer('search-api') }),
 * });
 * ```
 */
export class QuotaTracer {
  readonly #tracer: Tracer;
  readonly #serviceName: string;

  constructor(config: QuotaTracerConfig = {}) {
    this.#tracer = config.tracer ?? trace.getTracer('monthly-quota');
    this.#serviceName = config.serviceName ?? 'monthly-quota';
  }

  /**
   * Run `fn` inside a span. `describe` maps the result to attributes recorded
   * on success; a thrown error is recorded and re-thrown.
   */
  async trace<T>(
    operation: string,
    attributes: Attributes,
    fn: () => Promise<T>,
    describe?: (result: T) => Attributes,
  ): Promise<T> {
    const span = this.#tracer.startSpan(`quota.${operation}`, {
      attributes: { 'service.name': this.#serviceName, ...attributes },
    });

    try {
      const result = await fn();
      if (describe !== undefined) {
        span.setAttributes(describe(result));
      }
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      if (error instanceof Error) {
        span.recordException(error);
      }
      throw error;
    } finally {
      span.end();
    }
  }
}
