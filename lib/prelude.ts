export type {
    Deref, Equals
};
export {eq, truncate};

/** An abstract read-only container for a value of type T. */
interface Deref<T> {
    /** The contained value. */
    readonly value: T;
}

/** An equivalence relation on T, used to decide whether a new value is a change. */
type Equals<T> = (x: T, y: T) => boolean;

/** `Object.is` as an {@link Equals}: like === except that NaN equals itself and +0 differs from
    -0. The default everywhere an equality is taken. */
function eq<T>(x: T, y: T): boolean { return Object.is(x, y); }

/** Cut str down to at most maxLength characters (plus an ellipsis if anything was cut). */
function truncate(str: string, maxLength: number): string {
    if (str.length <= maxLength) { return str; }
    
    return `${str.substring(0, maxLength)}...`;
}
