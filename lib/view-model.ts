export {
    ViewModel
};

import {DisposedError, UnsupportedOperationError} from "./errors.js";
import {Notifier} from "./notifier.js";
import {mapView} from "./view.js";

/** Base class for application logic that exposes cells to a presentation layer. Cells created with
    `own()` are disposed together with the view-model, so late asynchronous completions in them
    notify no one.
    
    ```ts
    class CounterViewModel extends ViewModel {
        readonly count = this.own("count", new ValueCell(0));
        
        increment() { this.count.update((n) => n + 1); }
    }
    ``` */
abstract class ViewModel extends Notifier {
    private readonly owned = new Map<string, Notifier>();
    private readonly ownedView = mapView(this.owned);
    
    /** The owned cells by name, in order of registration. */
    get properties(): ReadonlyMap<string, Notifier> { return this.ownedView; }
    
    /** Take ownership of cell under name (unique per view-model) and return it. */
    protected own<C extends Notifier>(name: string, cell: C): C {
        if (this.isDisposed) { throw new DisposedError(this.constructor.name); }
        if (this.owned.has(name)) {
            throw new UnsupportedOperationError(
                `${this.constructor.name} already owns a property "${name}"`);
        }
        
        this.owned.set(name, cell);
        
        return cell;
    }
    
    /** Dispose all owned cells, then this. */
    dispose() {
        for (const cell of this.owned.values()) {
            cell.dispose();
        }
        
        super.dispose();
    }
}
