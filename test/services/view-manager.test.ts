import log from "../../src/logging/log.instance";
import { CounterModel } from "../../src/demo/counter-model";
import { ViewManager } from "../../src/services/view-manager";
import { UnregisteredSubjectError } from "../../src/services/observer/observer-errors";
import { PushButton } from "../../src/widgets/push-button";
import { TestSubject } from "../test-helper";

class TestViewManager extends ViewManager<CounterModel> {
    readonly modelUpdates: Array<number> = [];

    constructor(model: CounterModel) {
        super({ getModel: () => model });
    }

    protected createWidgets(): object {
        return {};
    }

    protected handleModelUpdate(): void {
        this.modelUpdates.push(this.getModel().getCount());
    }
}

type ButtonWidgets = {
    button: PushButton;
}

class ButtonViewManager extends ViewManager<CounterModel, ButtonWidgets> {

    constructor(model: CounterModel) {
        super({ getModel: () => model });
    }

    getButton(): PushButton {
        return this.widgets.button;
    }

    protected createWidgets(): ButtonWidgets {
        const button = new PushButton("plus", "+");
        this.observe(button, () => this.getModel().increment());
        return { button };
    }
}

describe("View manager", () => {
    let model: CounterModel;
    let viewManager: TestViewManager;
    let subject: TestSubject;

    beforeEach(() => {
        model = new CounterModel();
        viewManager = new TestViewManager(model);
        subject = new TestSubject("s1");
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe("registerSubject", () => {
        test("Should invoke the registered handler once per notification", () => {
            // arrange
            const handler = jest.fn();
            viewManager.registerSubject(subject, handler);
            subject.attach(viewManager);

            // act
            subject.notify();

            // assert
            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith();
        });

        test("Should replace the handler when a subject is registered again", () => {
            const first = jest.fn();
            const second = jest.fn();
            viewManager.observe(subject, first);

            viewManager.registerSubject(subject, second);
            subject.notify();

            expect(first).not.toHaveBeenCalled();
            expect(second).toHaveBeenCalledTimes(1);
        });

        test("Should only invoke the handler of the notifying subject", () => {
            const other = new TestSubject("s2");
            const firstHandler = jest.fn();
            const secondHandler = jest.fn();
            viewManager.observe(subject, firstHandler);
            viewManager.observe(other, secondHandler);

            subject.notify();

            expect(firstHandler).toHaveBeenCalledTimes(1);
            expect(secondHandler).not.toHaveBeenCalled();
        });
    });

    describe("update", () => {
        test("Should raise UnregisteredSubjectError for an attached subject without a handler", () => {
            subject.attach(viewManager);

            expect(() => subject.notify()).toThrow(UnregisteredSubjectError);
            expect(() => subject.notify())
                .toThrow("TestViewManager was notified by TestSubject(s1), which has no registered handler");
        });

        test("Should raise UnregisteredSubjectError when called directly with an unknown subject", () => {
            expect(() => viewManager.update(subject)).toThrow(UnregisteredSubjectError);
        });

        test("Should log the failing handler with its subject and rethrow", () => {
            // arrange
            const errorSpy = jest.spyOn(log, "error");
            function failingHandler(): void {
                throw new Error("boom");
            }
            viewManager.observe(subject, failingHandler);

            // act & assert
            expect(() => subject.notify()).toThrow("boom");
            expect(errorSpy).toHaveBeenCalledWith("Handler failingHandler for TestSubject(s1) failed: boom");
        });
    });

    describe("observe", () => {
        test("Should register the subject and attach the view manager to it", () => {
            viewManager.observe(subject, jest.fn());

            expect(viewManager.isRegistered(subject)).toBe(true);
            expect(subject.hasObserver(viewManager)).toBe(true);
        });
    });

    describe("unregisterSubject", () => {
        test("Should detach from the subject and forget its handler", () => {
            const handler = jest.fn();
            viewManager.observe(subject, handler);

            viewManager.unregisterSubject(subject);
            subject.notify();

            expect(viewManager.isRegistered(subject)).toBe(false);
            expect(subject.hasObserver(viewManager)).toBe(false);
            expect(handler).not.toHaveBeenCalled();
        });
    });

    describe("detached", () => {
        test("Should forget a subject that detached the view manager itself", () => {
            viewManager.observe(subject, jest.fn());

            subject.detach(viewManager);

            expect(viewManager.isRegistered(subject)).toBe(false);
            expect(viewManager.getRegisteredCount()).toBe(1);
        });

        test("Should forget a widget once it is destroyed", () => {
            // arrange
            const buttonViewManager = new ButtonViewManager(model);
            const button = buttonViewManager.getButton();

            // act
            button.destroy();

            // assert
            expect(buttonViewManager.isRegistered(button)).toBe(false);
            expect(button.hasObserver(buttonViewManager)).toBe(false);
            expect(buttonViewManager.getRegisteredCount()).toBe(1);
        });
    });

    describe("construction", () => {
        test("Should observe the model of its application", () => {
            expect(viewManager.getModel()).toBe(model);
            expect(viewManager.isRegistered(model)).toBe(true);
            expect(model.hasObserver(viewManager)).toBe(true);
            expect(viewManager.getRegisteredCount()).toBe(1);
        });

        test("Should run the model handler after each model change", () => {
            model.increment();
            model.increment();

            expect(viewManager.modelUpdates).toEqual([1, 2]);
        });

        test("Should have registered the widgets it creates before returning", () => {
            const buttonViewManager = new ButtonViewManager(model);

            expect(buttonViewManager.getRegisteredCount()).toBe(2);
            expect(buttonViewManager.isRegistered(buttonViewManager.getButton())).toBe(true);
        });

        test("Should route a widget change to the model and the model change back", () => {
            // arrange
            const buttonViewManager = new ButtonViewManager(model);

            // act
            buttonViewManager.getButton().click();

            // assert
            expect(model.getCount()).toBe(1);
            expect(viewManager.modelUpdates).toEqual([1]);
        });
    });

    describe("destroy", () => {
        test("Should detach from every subject and clear the registry", () => {
            viewManager.observe(subject, jest.fn());

            viewManager.destroy();

            expect(viewManager.getRegisteredCount()).toBe(0);
            expect(subject.hasObserver(viewManager)).toBe(false);
            expect(model.hasObserver(viewManager)).toBe(false);
        });
    });
});
