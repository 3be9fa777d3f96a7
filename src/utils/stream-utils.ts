import { Readable, Writable } from "stream";

export class StreamUtils {
    private constructor() {
        // utility class
    }

    /** Reads `source` to its end and decodes it as UTF-8 */
    static async readAll(source: Readable): Promise<string> {
        const chunks: Array<Buffer> = [];
        for await (const chunk of source) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8"));
        }
        return Buffer.concat(chunks).toString("utf8");
    }

    /** Writes `text` to `sink` and resolves once the sink accepted it. The sink is left open */
    static writeText(sink: Writable, text: string): Promise<void> {
        return new Promise((resolve, reject) => {
            sink.write(text, "utf8", error => error ? reject(error) : resolve());
        });
    }
}
