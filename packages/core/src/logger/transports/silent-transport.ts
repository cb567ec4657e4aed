/**
 * Silent Transport
 *
 * Discards every entry. Used when the host application owns all output.
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {
        // discard
    }

    destroy(): void {
        // nothing to release
    }
}
