import "reflect-metadata";

export { Observer } from "./services/observer/observer.interface";
export { Subject } from "./services/observer/subject.interface";
export { ObserverSet } from "./services/observer/observer-set";
export { SubjectBase } from "./services/observer/subject-base";
export { NotificationQueue, NotificationJob, defaultNotificationQueue } from "./services/observer/notification-queue";
export { UnregisteredSubjectError, NotificationError, ModelFormatError } from "./services/observer/observer-errors";
export { ViewManager, UpdateHandler, ModelProvider } from "./services/view-manager";
export { Model } from "./models/model";
export { AppAboutInfo, DEFAULT_ABOUT_INFO, toAboutInfo, formatAboutMessage, formatAboutTitle } from "./models/about-info";
export { AppController, AppControllerOptions } from "./controller/app-controller";
export { MenuSpec, MenuAction, MenuEntry, StandardMenuHandlers, buildMenubar, flattenMenu, isMenuAction } from "./controller/menu";
export { MenuLabel } from "./enums/menu-label.enum";
export { Toolkit, FileType, FileDialogOptions } from "./toolkit/toolkit.interface";
export { HeadlessToolkit, ShownMessage } from "./toolkit/headless-toolkit";
export { Widget } from "./widgets/widget";
export { PushButton } from "./widgets/push-button";
export { TextLabel } from "./widgets/text-label";
export { ToggleWidget } from "./widgets/toggle-widget";
export { ConfigService } from "./services/config-service";
export { StreamUtils } from "./utils/stream-utils";
