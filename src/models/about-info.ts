import _ from "lodash";

/**
 * The "About" information of an application. The framework passes it to the About dialog as is.
 */
export type AppAboutInfo = {
    name: string;
    version: string;
    copyright: string;
    author: string;
    license: string;
    /** Where the source code can be found */
    source: string;
}

export const DEFAULT_ABOUT_INFO: Readonly<AppAboutInfo> = {
    name: "my app",
    version: "X.X",
    copyright: "20XX",
    author: "John Q. Public",
    license: "MIT License",
    source: "github url"
};

/** Completes the missing fields of `info` from {@link DEFAULT_ABOUT_INFO} */
export function toAboutInfo(info: Partial<AppAboutInfo> = {}): AppAboutInfo {
    return _.defaults({}, _.omitBy(info, _.isNil), DEFAULT_ABOUT_INFO);
}

export function formatAboutTitle(info: AppAboutInfo): string {
    return "About " + info.name;
}

export function formatAboutMessage(info: AppAboutInfo): string {
    let msg = info.name + "\n";
    msg += "version " + info.version + "\n";
    msg += "Copyright (c) " + info.copyright + " by " + info.author + "\n";
    msg += "Licensed under the " + info.license + "\n";
    msg += "Source: " + info.source;
    return msg;
}
