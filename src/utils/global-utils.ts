/**
 * General purpose utility class
 */
export class GlobalUtils {

    private constructor() {
        // utility class
    }

    /**
     * Short label for an object in log lines and error messages, e.g. `ToggleWidget(toggle)`.
     * The `name` property is appended when the object carries a string one.
     */
    static describe(value: object): string {
        const className = value.constructor?.name || "Object";
        if ("name" in value && typeof value.name === "string" && value.name.length > 0) {
            return `${className}(${value.name})`;
        }
        return className;
    }

    /** Name of a handler function, `<anonymous>` for arrow functions assigned nowhere */
    static functionName(fn: (...args: never[]) => unknown): string {
        return fn.name.length > 0 ? fn.name : "<anonymous>";
    }

    static errorMessage(e: unknown): string {
        return e instanceof Error ? e.message : String(e);
    }
}
