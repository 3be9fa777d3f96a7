import { Readable, Writable } from "stream";
import { Model } from "../models/model";
import { ModelFormatError } from "../services/observer/observer-errors";
import { NotificationQueue } from "../services/observer/notification-queue";
import { StreamUtils } from "../utils/stream-utils";
import { GlobalUtils } from "../utils/global-utils";

export type CounterState = {
    count: number;
}

/**
 * Model of the demo application: counts how many times the toggle was started.
 * Stored as JSON, e.g. `{"count": 7}`.
 */
export class CounterModel extends Model {
    static readonly FORMAT = ".json";

    private count = 0;

    constructor(queue?: NotificationQueue) {
        super(queue);
    }

    getCount(): number {
        return this.count;
    }

    increment(step = 1): void {
        this.setCount(this.count + step);
    }

    setCount(value: number): void {
        if (!Number.isInteger(value) || value < 0) {
            throw new Error(`${value} must be a non-negative integer`);
        }
        this.mutate(() => {
            this.count = value;
        });
    }

    reset(): void {
        this.setCount(0);
    }

    toJSON(): CounterState {
        return { count: this.count };
    }

    async readFrom(source: Readable, format = CounterModel.FORMAT): Promise<void> {
        CounterModel.checkFormat(format);
        const state = CounterModel.parse(await StreamUtils.readAll(source));
        this.mutate(() => {
            this.count = state.count;
        });
    }

    async writeTo(sink: Writable, format = CounterModel.FORMAT): Promise<void> {
        CounterModel.checkFormat(format);
        await StreamUtils.writeText(sink, JSON.stringify(this.toJSON(), null, 4) + "\n");
    }

    static parse(text: string): CounterState {
        let data: unknown;
        try {
            data = JSON.parse(text);
        } catch (e) {
            throw new ModelFormatError(`Counter content is not valid JSON: ${GlobalUtils.errorMessage(e)}`);
        }
        if (typeof data !== "object" || data === null || Array.isArray(data) || !("count" in data)) {
            throw new ModelFormatError("Counter content must be an object with a count");
        }
        const count = data.count;
        if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
            throw new ModelFormatError(`Counter count must be a non-negative integer, got ${JSON.stringify(count)}`);
        }
        return { count };
    }

    private static checkFormat(format: string): void {
        if (format.toLowerCase() !== CounterModel.FORMAT) {
            throw new ModelFormatError(`Unsupported counter format "${format}", expected "${CounterModel.FORMAT}"`);
        }
    }
}
