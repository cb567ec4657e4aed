/**
 * File Transport
 *
 * Appends JSON lines to a file, rotating by size.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize: number = 0;
    private isRotating: boolean = false;
    private pendingLogs: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.createWriteStream();
    }

    private createWriteStream(): void {
        this.writeStream = fs.createWriteStream(this.filePath, {
            flags: 'a',
            encoding: 'utf8',
        });

        this.writeStream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';
        const lineSize = Buffer.byteLength(line, 'utf8');

        // Buffer while rotating so nothing is lost
        if (!this.writeStream || this.isRotating) {
            this.pendingLogs.push(line);
            return;
        }

        if (this.currentSize + lineSize > this.maxSize) {
            this.pendingLogs.push(line);
            void this.rotate();
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    /**
     * Shifts rotated files up (.1 -> .2, ...), drops the oldest, then reopens the stream
     */
    private async rotate(): Promise<void> {
        if (this.isRotating) {
            return;
        }

        this.isRotating = true;

        try {
            const stream = this.writeStream;
            if (stream) {
                await new Promise<void>((resolve) => {
                    stream.end(() => resolve());
                });
                this.writeStream = null;
            }

            await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

            for (let i = this.maxFiles - 1; i >= 1; i--) {
                await this.renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
            }
            await this.renameIfExists(this.filePath, `${this.filePath}.1`);

            this.currentSize = 0;
            this.createWriteStream();

            this.flushPendingLogs();
        } catch (error) {
            console.error('FileTransport rotation error:', error);
        } finally {
            this.isRotating = false;
        }
    }

    private async renameIfExists(from: string, to: string): Promise<void> {
        if (fs.existsSync(from)) {
            await fs.promises.rename(from, to);
        }
    }

    /**
     * Writes lines buffered during rotation into the fresh file
     */
    private flushPendingLogs(): void {
        const stream = this.writeStream;
        if (!stream) {
            return;
        }
        const lines = this.pendingLogs.splice(0, this.pendingLogs.length);
        for (const line of lines) {
            stream.write(line);
            this.currentSize += Buffer.byteLength(line, 'utf8');
        }
    }

    getFilePath(): string {
        return this.filePath;
    }

    destroy(): void {
        if (this.writeStream) {
            this.writeStream.end();
            this.writeStream = null;
        }
    }
}
