import { StringDecoder } from 'string_decoder';
import { ProtocolError } from './errors';

export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

/**
 * Splits a byte stream into JSON documents.
 *
 * The device does not delimit its replies, and a reply may span several reads, so
 * documents are cut where the top-level object or array closes. Whitespace (including
 * newlines) between documents is skipped.
 */
export class JsonFrameReader {
    private readonly decoder = new StringDecoder('utf8');
    private readonly maxFrameBytes: number;
    private buffer = '';
    private cursor = 0;
    private depth = 0;
    private inString = false;
    private escaped = false;

    constructor(maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {
        this.maxFrameBytes = maxFrameBytes;
    }

    get pendingBytes(): number {
        return Buffer.byteLength(this.buffer);
    }

    push(chunk: Buffer | string): unknown[] {
        this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

        const documents: unknown[] = [];
        while (true) {
            if (this.depth === 0) {
                this.buffer = this.buffer.trimStart();
                this.cursor = 0;
                if (this.buffer.length === 0) {
                    break;
                }
                const first = this.buffer.charAt(0);
                if (first !== '{' && first !== '[') {
                    throw new ProtocolError(`Unexpected data on RPC channel: ${JSON.stringify(this.buffer.slice(0, 32))}`);
                }
            }

            const end = this.scan();
            if (end === -1) {
                break;
            }

            const text = this.buffer.slice(0, end);
            this.buffer = this.buffer.slice(end);
            this.cursor = 0;
            documents.push(parseDocument(text));
        }

        if (this.pendingBytes > this.maxFrameBytes) {
            throw new ProtocolError(`RPC frame exceeds ${this.maxFrameBytes} bytes`);
        }
        return documents;
    }

    /** Returns the index just past the closing bracket, or -1 if the document is incomplete. */
    private scan(): number {
        for (let i = this.cursor; i < this.buffer.length; i++) {
            const ch = this.buffer.charAt(i);

            if (this.inString) {
                if (this.escaped) {
                    this.escaped = false;
                } else if (ch === '\\') {
                    this.escaped = true;
                } else if (ch === '"') {
                    this.inString = false;
                }
                continue;
            }

            if (ch === '"') {
                this.inString = true;
            } else if (ch === '{' || ch === '[') {
                this.depth++;
            } else if (ch === '}' || ch === ']') {
                this.depth--;
                if (this.depth === 0) {
                    return i + 1;
                }
            }
        }
        this.cursor = this.buffer.length;
        return -1;
    }
}

function parseDocument(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch (err) {
        throw new ProtocolError('Device sent malformed JSON', { cause: err });
    }
}
