import log from "../logging/log.instance";
import { ModelProvider, ViewManager } from "../services/view-manager";
import { PushButton } from "../widgets/push-button";
import { TextLabel } from "../widgets/text-label";
import { ToggleWidget } from "../widgets/toggle-widget";
import { CounterModel } from "./counter-model";

export type DemoWidgets = {
    toggle: ToggleWidget;
    reset: PushButton;
    countLabel: TextLabel;
}

/**
 * Every start of the toggle increments the counter, the reset button clears it,
 * and the label shows the counter.
 */
export class DemoViewManager extends ViewManager<CounterModel, DemoWidgets> {

    constructor(app: ModelProvider<CounterModel>) {
        super(app);
        this.refreshCountLabel();
    }

    static formatCount(count: number): string {
        return `Started ${count} time(s)`;
    }

    getWidgets(): DemoWidgets {
        return this.widgets;
    }

    protected createWidgets(): DemoWidgets {
        const toggle = new ToggleWidget("toggle");
        this.observe(toggle, () => this.handleToggleUpdate());
        const reset = new PushButton("reset", "Reset");
        this.observe(reset, () => this.handleResetUpdate());
        // the label never notifies, nothing to observe
        const countLabel = new TextLabel("count");
        return { toggle, reset, countLabel };
    }

    protected handleModelUpdate(): void {
        this.refreshCountLabel();
    }

    private handleToggleUpdate(): void {
        log.info(`Toggle ${this.widgets.toggle.isStarted() ? "started" : "stopped"}`);
        if (this.widgets.toggle.isStarted()) {
            this.getModel().increment();
        }
    }

    private handleResetUpdate(): void {
        this.getModel().reset();
    }

    private refreshCountLabel(): void {
        this.widgets.countLabel.setText(DemoViewManager.formatCount(this.getModel().getCount()));
    }
}
