export type {
    Selectable
};
export {
    SelectedCell,
    select
};

import type {Deref, Equals} from "./prelude.js";
import {eq} from "./prelude.js";
import type {Observable, Subscription} from "./notifier.js";
import {DerivedNotifier} from "./notifier.js";

/** Anything with a current value that notifies when the value (may have) changed. */
interface Selectable<T> extends Deref<T>, Observable {}

/** A derived cell whose value is always selector(source.value). It only notifies its subscribers
    when that projection changes wrt. equals(), so a consumer can depend on a slice of a larger
    value without hearing about changes to the rest of it.
    
    The source is only subscribed to while this has subscribers; without subscribers `value` is
    recomputed on every read. */
class SelectedCell<T, R> extends DerivedNotifier implements Deref<R> {
    private selected: R;
    private upstream: Subscription | undefined = undefined;
    
    constructor(
        private readonly source: Selectable<T>,
        private readonly selector: (v: T) => R,
        private readonly equals: Equals<R> = eq
    ) {
        super();
        
        this.selected = selector(source.value);
    }
    
    get value(): R {
        // If `this` has no subscribers it does not watch `source` either so `this.selected` could
        // be stale:
        if (!this.isAttached) { return this.selector(this.source.value); }
        
        return this.selected;
    }
    
    /** Select further from this (see {@link select}). */
    select<U>(selector: (v: R) => U, equals?: Equals<U>): SelectedCell<R, U> {
        return new SelectedCell(this, selector, equals);
    }
    
    protected subscribeToDeps() {
        this.upstream = this.source.subscribe(() => this.onSourceChange());
        
        this.selected = this.selector(this.source.value);
    }
    
    protected unsubscribeFromDeps() {
        this.upstream?.unsubscribe();
        this.upstream = undefined;
    }
    
    private onSourceChange() {
        const newVal = this.selector(this.source.value);
        if (this.equals(this.selected, newVal)) { return; }
        
        this.selected = newVal;
        this.notify();
    }
}

/** Create a {@link SelectedCell} of source with selector, notifying only when the selected value
    changes wrt. equals() (`Object.is` by default). */
function select<T, R>(source: Selectable<T>, selector: (v: T) => R, equals?: Equals<R>
): SelectedCell<T, R> {
    return new SelectedCell(source, selector, equals);
}
