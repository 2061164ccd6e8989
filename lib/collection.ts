export {
    CollectionCell
};

import {Cell} from "./cell.js";
import {scopedHandle} from "./view.js";

/** Common base of the observable collections: a private backing collection of type C that is only
    exposed through a read-only view V and mutable through the subclass's own methods, `batch` and
    `silent`. In is what `replaceAll` takes.
    
    Subclass operations notify once per operation that changed something (see the subclasses for
    what counts) and must evaluate user input (iterables, callbacks) before touching the backing
    collection, so a throwing input leaves the collection as it was. */
abstract class CollectionCell<V extends object, C extends V, In> extends Cell<V> {
    protected constructor(
        /** The backing collection. Never handed out as is. */
        protected readonly backing: C,
        private readonly view: V
    ) {
        super();
    }
    
    /** A read-only view (not a copy) of the current contents. Always the same object. */
    get value(): V { return this.view; }
    
    /** Replace the contents with contents. Notifies exactly once, even if nothing changed. */
    replaceAll(contents: In) {
        this.load(this.collect(contents));
        this.notify();
    }
    
    /** Run action on a mutable handle to the backing collection, then notify exactly once (even if
        action did not change anything). The handle stops working when action returns. If action
        throws, the previous contents are restored, nothing is notified and the error is
        rethrown. */
    batch(action: (handle: C) => void) {
        this.mutate(action);
        this.notify();
    }
    
    /** Like {@link batch} but does not notify; call `refresh()` afterwards to do that. */
    silent(action: (handle: C) => void) {
        this.mutate(action);
    }
    
    /** A fresh, independent collection with the given contents. */
    protected abstract collect(contents: In): C;
    
    /** Make the backing collection's contents those of contents (keeping its identity). */
    protected abstract load(contents: C): void;
    
    private mutate(action: (handle: C) => void) {
        const before = this.copy();
        const {handle, revoke} = scopedHandle(this.backing);
        
        try {
            action(handle);
        } catch (error) {
            this.load(before);
            throw error;
        } finally {
            revoke();
        }
    }
    
    /** A copy of the current contents. */
    protected abstract copy(): C;
}
