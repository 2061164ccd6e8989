export {
    Cell,
    ValueCell
};

import type {Deref, Equals} from "./prelude.js";
import {eq} from "./prelude.js";
import {Notifier} from "./notifier.js";
import {SelectedCell} from "./select.js";

/** Contains a value that changes over time and can be read and the changes subscribed to. */
abstract class Cell<T> extends Notifier implements Deref<T> {
    abstract get value(): T;
    
    /** Create a derived cell whose value is always selector(this.value).
        If this notifies but the selected value has not changed wrt. equals() the derived cell does
        not notify its subscribers. */
    select<R>(selector: (v: T) => R, equals?: Equals<R>): SelectedCell<T, R> {
        return new SelectedCell(this, selector, equals);
    }
    
    /** Notify subscribers without changing anything; for when something the value refers to was
        mutated behind the cell's back. */
    refresh() { this.notify(); }
}

/** A single value. Assigning a value that equals() the current one is not a change and does not
    notify.
    
    Only the reference is compared, so in-place mutation of a mutable value goes unnoticed; call
    `refresh()` after one. */
class ValueCell<T> extends Cell<T> {
    constructor(
        private v: T,
        private readonly equals: Equals<T> = eq
    ) {
        super();
    }
    
    get value(): T { return this.v; }
    
    set value(v: T) {
        if (this.equals(this.v, v)) { return; }
        
        this.v = v;
        this.notify();
    }
    
    /** Set the value to f(this.value) (with the same no-change check as the setter). */
    update(f: (v: T) => T) {
        this.value = f(this.v);
    }
}
