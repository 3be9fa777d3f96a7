export enum MenuLabel {
    FILE = "File",
    OPEN = "Open...",
    SAVE = "Save",
    SAVE_AS = "Save As...",
    EXIT = "Exit",
    HELP = "Help",
    ABOUT = "About..."
}
