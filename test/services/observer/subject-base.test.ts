import log from "../../../src/logging/log.instance";
import { ObserverSet } from "../../../src/services/observer/observer-set";
import { Observer } from "../../../src/services/observer/observer.interface";
import { Subject } from "../../../src/services/observer/subject.interface";
import { NotificationError } from "../../../src/services/observer/observer-errors";
import { RecordingObserver, TestSubject } from "../../test-helper";

describe("Subject", () => {
    let subject: TestSubject;

    beforeEach(() => {
        subject = new TestSubject("subject");
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("Should start without observers", () => {
        expect(subject.getObserverCount()).toBe(0);
    });

    test("Should call update once with the notifying subject", () => {
        // arrange
        const observer = new RecordingObserver("observer");
        subject.attach(observer);

        // act
        subject.notify();

        // assert
        expect(observer.updates).toHaveLength(1);
        expect(observer.updates[0]).toBe(subject);
    });

    test("Should not call a detached observer", () => {
        const observer = new RecordingObserver("observer");
        subject.attach(observer);
        subject.detach(observer);

        subject.notify();

        expect(observer.updates).toHaveLength(0);
        expect(subject.hasObserver(observer)).toBe(false);
    });

    test("Should keep a single entry when the same observer is attached twice", () => {
        const observer = new RecordingObserver("observer");
        subject.attach(observer);
        subject.attach(observer);

        subject.notify();

        expect(subject.getObserverCount()).toBe(1);
        expect(observer.updates).toHaveLength(1);
    });

    test("Should ignore detaching an observer that was never attached", () => {
        const attached = new RecordingObserver("attached");
        subject.attach(attached);

        expect(() => subject.detach(new RecordingObserver("stranger"))).not.toThrow();
        expect(subject.getObserverCount()).toBe(1);
    });

    test("Should notify observers in attachment order", () => {
        const calls: Array<string> = [];
        for (const name of ["first", "second", "third"]) {
            subject.attach(new RecordingObserver(name, () => calls.push(name)));
        }

        subject.notify();

        expect(calls).toEqual(["first", "second", "third"]);
    });

    test("Should not call an observer attached during the fan-out until the next notification", () => {
        // arrange
        const late = new RecordingObserver("late");
        subject.attach(new RecordingObserver("attacher", s => s.attach(late)));

        // act
        subject.notify();

        // assert
        expect(late.updates).toHaveLength(0);
        subject.notify();
        expect(late.updates).toHaveLength(1);
    });

    test("Should skip an observer detached by an earlier observer of the same fan-out", () => {
        const second = new RecordingObserver("second");
        subject.attach(new RecordingObserver("detacher", s => s.detach(second)));
        subject.attach(second);

        subject.notify();

        expect(second.updates).toHaveLength(0);
        expect(subject.getObserverCount()).toBe(1);
    });

    test("Should notify the remaining observers and rethrow when an observer fails", () => {
        // arrange
        const errorSpy = jest.spyOn(log, "error");
        const failing = new RecordingObserver("failing", () => {
            throw new Error("boom");
        });
        const next = new RecordingObserver("next");
        subject.attach(failing);
        subject.attach(next);

        // act & assert
        expect(() => subject.notify()).toThrow("boom");
        expect(next.updates).toHaveLength(1);
        expect(errorSpy).toHaveBeenCalledWith(
            "RecordingObserver(failing) failed to handle a notification from TestSubject(subject): boom");
    });

    test("Should report every failure of a fan-out in a NotificationError", () => {
        for (const name of ["one", "two"]) {
            subject.attach(new RecordingObserver(name, () => {
                throw new Error(`${name} failed`);
            }));
        }

        let error: unknown;
        try {
            subject.notify();
        } catch (e) {
            error = e;
        }

        expect(error).toBeInstanceOf(NotificationError);
        expect(error).toMatchObject({
            errors: [new Error("one failed"), new Error("two failed")],
            message: "2 observers failed to handle a notification: one failed; two failed"
        });
    });

    test("Should run a notification issued during a fan-out after that fan-out", () => {
        // arrange
        const other = new TestSubject("other");
        const calls: Array<string> = [];
        subject.attach(new RecordingObserver("first", () => {
            calls.push("subject:first");
            other.notify();
        }));
        subject.attach(new RecordingObserver("second", () => calls.push("subject:second")));
        other.attach(new RecordingObserver("other", () => calls.push("other")));

        // act
        subject.notify();

        // assert
        expect(calls).toEqual(["subject:first", "subject:second", "other"]);
    });

    test("Should detach every observer on detachAll", () => {
        subject.attach(new RecordingObserver("one"));
        subject.attach(new RecordingObserver("two"));

        subject.detachAll();

        expect(subject.getObserverCount()).toBe(0);
    });

    test("Should tell an observer that it was detached, once", () => {
        // arrange
        const detached: Array<Subject> = [];
        const observer: Observer = { update: jest.fn(), detached: from => detached.push(from) };
        subject.attach(observer);

        // act
        subject.detach(observer);
        subject.detach(observer);

        // assert
        expect(detached).toEqual([subject]);
    });

    test("Should tell every observer it was detached on detachAll", () => {
        const detached: Array<string> = [];
        subject.attach({ update: jest.fn(), detached: () => detached.push("one") });
        subject.attach({ update: jest.fn(), detached: () => detached.push("two") });

        subject.detachAll();

        expect(detached).toEqual(["one", "two"]);
    });

    describe("ObserverSet", () => {
        /** A subject built by composition rather than by extending SubjectBase */
        class Thermometer implements Subject {
            private readonly observers = new ObserverSet(this);
            private celsius = 20;

            attach(observer: Observer): void {
                this.observers.add(observer);
            }

            detach(observer: Observer): void {
                this.observers.remove(observer);
            }

            notify(): void {
                this.observers.notify();
            }

            getCelsius(): number {
                return this.celsius;
            }

            setCelsius(celsius: number): void {
                this.celsius = celsius;
                this.notify();
            }
        }

        test("Should pass its owner to the observers", () => {
            const thermometer = new Thermometer();
            const readings: Array<number> = [];
            thermometer.attach(new RecordingObserver("display", s => {
                if (s instanceof Thermometer) {
                    readings.push(s.getCelsius());
                }
            }));

            thermometer.setCelsius(25);

            expect(readings).toEqual([25]);
        });
    });
});
