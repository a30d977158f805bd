import _ = require("lodash");
import {ICancellationToken} from "../public/api/ICancellationToken";

export class CancellationToken implements ICancellationToken {

    isCanceled: boolean = false;

    private listeners: Array<() => void> = [];

    isCancellationRequested(): boolean {
        return this.isCanceled;
    }

    onCancellationRequested(listener: () => void): () => void {
        if (this.isCanceled) {
            listener();
            return _.noop;
        }

        this.listeners.push(listener);
        return () => {
            _.pull(this.listeners, listener);
        };
    }

    /**
     * Requests cancellation. Listeners are called once, in registration order; later calls do nothing.
     */
    cancel(): void {
        if (this.isCanceled) {
            return;
        }

        this.isCanceled = true;
        const listeners: Array<() => void> = this.listeners;
        this.listeners = [];
        _.forEach(listeners, (listener: () => void) => listener());
    }
}
