export type {Deref, Equals} from "./prelude.js";
export {eq} from "./prelude.js";
export {UnsupportedOperationError, DisposedError, NotifyError} from "./errors.js";

export type {Subscriber, Observable} from "./notifier.js";
export {Subscription, Notifier, DerivedNotifier} from "./notifier.js";
export {Cell, ValueCell} from "./cell.js";
export type {Selectable} from "./select.js";
export {SelectedCell, select} from "./select.js";
export {MergedNotifier, merge} from "./merge.js";

export {CollectionCell} from "./collection.js";
export {ListCell} from "./list.js";
export {MapCell} from "./map.js";
export {SetCell} from "./set.js";

export type {
    AsyncState, AsyncHandlers, PartialAsyncHandlers, AsyncHandlersWithPrevious
} from "./async-state.js";
export {
    Idle, Loading, Data, Failure, StreamCompleted,
    idle, loading, data, failure, streamCompleted,
    dispatch, dispatchPartial, dispatchWithPrevious,
    currentData,
    isIdle, isLoading, hasData, hasError, isCompleted,
    stackOf
} from "./async-state.js";
export {AsyncCell} from "./async-cell.js";
export {TaskCell} from "./task.js";
export type {StreamSource, BindOptions} from "./stream.js";
export {StreamCell} from "./stream.js";

export {ViewModel} from "./view-model.js";
export type {PropertySnapshot, ViewModelSnapshot, DiagnosticsOptions} from "./diagnostics.js";
export {DiagnosticsCollector} from "./diagnostics.js";
