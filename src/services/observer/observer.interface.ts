import { Subject } from "./subject.interface";


export interface Observer {

    /** This method is called by {@link Subject.notify} with the subject whose state changed */
    update(subject: Subject): void;

    /** Called once `subject` has dropped this observer, whoever asked for it */
    detached?(subject: Subject): void;
}
