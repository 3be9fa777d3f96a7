import _ from "lodash";
import { MenuLabel } from "../enums/menu-label.enum";

export type MenuAction = () => void | Promise<void>;

/**
 * Describes a menubar: each label maps to the action it runs, or to a nested menu for a cascade.
 * Items keep their declaration order.
 */
export interface MenuSpec {
    [label: string]: MenuAction | MenuSpec;
}

export type MenuEntry = {
    path: Array<string>;
    action: MenuAction;
}

/** Handlers of the items every application menubar gets */
export type StandardMenuHandlers = {
    onFileOpen: MenuAction;
    onFileSave: MenuAction;
    onFileSaveAs: MenuAction;
    onFileExit: MenuAction;
    onHelpAbout: MenuAction;
}

export function isMenuAction(item: MenuAction | MenuSpec): item is MenuAction {
    return typeof item === "function";
}

/**
 * Builds the menubar of an application.
 *
 * An empty `menu` gives `File` (Open..., Save, Save As..., Exit) and `Help` (About...).
 * Otherwise `menu` is kept as given and `File > Exit` and `Help > About...` are appended
 * where it does not define them.
 */
export function buildMenubar(menu: MenuSpec, handlers: StandardMenuHandlers): MenuSpec {
    if (_.isEmpty(menu)) {
        return {
            [MenuLabel.FILE]: {
                [MenuLabel.OPEN]: handlers.onFileOpen,
                [MenuLabel.SAVE]: handlers.onFileSave,
                [MenuLabel.SAVE_AS]: handlers.onFileSaveAs,
                [MenuLabel.EXIT]: handlers.onFileExit
            },
            [MenuLabel.HELP]: {
                [MenuLabel.ABOUT]: handlers.onHelpAbout
            }
        };
    }
    const menubar: MenuSpec = { ...menu };
    ensureItem(menubar, MenuLabel.FILE, MenuLabel.EXIT, handlers.onFileExit);
    ensureItem(menubar, MenuLabel.HELP, MenuLabel.ABOUT, handlers.onHelpAbout);
    return menubar;
}

/** Leaves of `menu` in declaration order, each with the labels leading to it */
export function flattenMenu(menu: MenuSpec, parentPath: Array<string> = []): Array<MenuEntry> {
    const entries: Array<MenuEntry> = [];
    for (const [label, item] of Object.entries(menu)) {
        const path = [...parentPath, label];
        if (isMenuAction(item)) {
            entries.push({ path, action: item });
        } else {
            entries.push(...flattenMenu(item, path));
        }
    }
    return entries;
}

function ensureItem(menubar: MenuSpec, cascadeLabel: string, itemLabel: string, action: MenuAction): void {
    const cascade = menubar[cascadeLabel];
    if (cascade === undefined) {
        menubar[cascadeLabel] = { [itemLabel]: action };
    } else if (!isMenuAction(cascade) && !(itemLabel in cascade)) {
        menubar[cascadeLabel] = { ...cascade, [itemLabel]: action };
    }
}
