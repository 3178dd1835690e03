/**
 * @fileoverview Tracing Shutdown
 *
 * Flushes pending spans on SIGTERM. The process is not exited here: Nest's
 * shutdown hooks close the application and re-raise the signal, and this
 * listener is registered once so that second signal terminates the process.
 */

export interface ShutdownTarget {
    shutdown(): Promise<void>;
}

export interface SignalSource {
    once(event: 'SIGTERM', listener: () => void): unknown;
}

export function shutdownOnSigterm(sdk: ShutdownTarget, signals: SignalSource = process): void {
    signals.once('SIGTERM', () => {
        sdk.shutdown()
            .then(() => console.log('Tracing terminated'))
            .catch((error: unknown) => console.error('Error terminating tracing', error));
    });
}
