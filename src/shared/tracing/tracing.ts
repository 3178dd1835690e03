/**
 * @fileoverview OpenTelemetry Tracing Setup
 *
 * Auto-instrumentation (HTTP, Express, MongoDB) with OTLP export.
 * This file MUST be imported before any other imports in main.ts.
 *
 * @remarks
 * Local: Exports to http://localhost:4318, 100% sampling
 * Production: Configure OTEL_EXPORTER_OTLP_ENDPOINT, 10% sampling
 */

import { NodeSDK, tracing } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { shutdownOnSigterm } from './shutdown';

const isProduction = process.env.NODE_ENV === 'production';

// Production: 10% sampling to reduce cost
// Local: 100% sampling for debugging
const sampler = isProduction
    ? new tracing.ParentBasedSampler({ root: new tracing.TraceIdRatioBasedSampler(0.1) })
    : new tracing.AlwaysOnSampler();

const traceExporter = new OTLPTraceExporter({
    url: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
});

const sdk = new NodeSDK({
    serviceName: 'sanctuary-api',
    traceExporter,
    sampler,
    instrumentations: [
        getNodeAutoInstrumentations({
            // Disable noisy instrumentations
            '@opentelemetry/instrumentation-fs': { enabled: false },
            '@opentelemetry/instrumentation-dns': { enabled: false },
        }),
    ],
});

sdk.start();

shutdownOnSigterm(sdk);

export { sdk };
