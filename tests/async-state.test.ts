import {
    Idle, Loading, Data, Failure, StreamCompleted,
    idle, loading, data, failure, streamCompleted,
    dispatch, dispatchPartial, dispatchWithPrevious,
    currentData,
    isIdle, isLoading, hasData, hasError, isCompleted,
    stackOf
} from '../lib/async-state.js';
import type {AsyncState, AsyncHandlers} from '../lib/async-state.js';

const describer: AsyncHandlers<number, string> = {
    idle: () => 'idle',
    loading: () => 'loading',
    data: (n) => `data ${n}`,
    error: (error) => `error ${String(error)}`
};

describe('testing `AsyncState` construction', () => {
    test('variants', () => {
        expect(idle()).toBeInstanceOf(Idle);
        expect(idle()).toBe(idle());
        expect(loading(1)).toBeInstanceOf(Loading);
        expect(data(1)).toBeInstanceOf(Data);
        expect(failure('oops')).toBeInstanceOf(Failure);
        expect(streamCompleted(1)).toBeInstanceOf(StreamCompleted);
        
        expect(loading<number>().previousData).toBeUndefined();
        expect(loading(1).previousData).toBe(1);
        expect(data('x').data).toBe('x');
        expect(streamCompleted(2).lastData).toBe(2);
    });
    
    test('states are immutable', () => {
        const state = data(1);
        
        expect(Object.isFrozen(state)).toBe(true);
        expect(Object.isFrozen(idle())).toBe(true);
        expect(Reflect.set(state, 'data', 2)).toBe(false);
        expect(state.data).toBe(1);
    });
    
    test('failure() stack context', () => {
        const error = new Error('test failure');
        
        expect(failure(error).stackContext).toBe(error.stack);
        expect(failure(error, 'here').stackContext).toBe('here');
        expect(failure('not an Error').stackContext).toEqual(expect.any(String));
        expect(failure(error, undefined, 3).previousData).toBe(3);
    });
    
    test('stackOf()', () => {
        const error = new Error('test failure');
        
        expect(stackOf(error)).toBe(error.stack);
        expect(stackOf(42)).toContain('stackOf');
    });
});

describe('testing `dispatch`', () => {
    test('one handler per variant', () => {
        expect(dispatch(idle(), describer)).toBe('idle');
        expect(dispatch(loading(1), describer)).toBe('loading');
        expect(dispatch(data(2), describer)).toBe('data 2');
        expect(dispatch(failure<number>('bad'), describer)).toBe('error bad');
    });
    
    test('error handler gets the stack context', () => {
        const state = failure<number>('bad', 'context');
        
        const handlers = {...describer, error: (_: unknown, stack: string | undefined) => stack};
        
        expect(dispatch<number, string | undefined>(state, handlers)).toBe('context');
    });
    
    test('completed without a handler falls back to data or idle', () => {
        expect(dispatch(streamCompleted(3), describer)).toBe('data 3');
        expect(dispatch(streamCompleted<number>(), describer)).toBe('idle');
    });
    
    test('completed with a handler', () => {
        const handlers = {...describer, completed: (n: number | undefined) => `done ${n}`};
        
        expect(dispatch(streamCompleted(3), handlers)).toBe('done 3');
        expect(dispatch(streamCompleted<number>(), handlers)).toBe('done undefined');
    });
});

describe('testing `dispatchPartial`', () => {
    test('falls back to orElse', () => {
        const handlers = {data: (n: number) => `data ${n}`};
        const orElse = () => 'else';
        
        expect(dispatchPartial(data(1), handlers, orElse)).toBe('data 1');
        expect(dispatchPartial(idle(), handlers, orElse)).toBe('else');
        expect(dispatchPartial(loading(1), handlers, orElse)).toBe('else');
        expect(dispatchPartial(failure<number>('bad'), handlers, orElse)).toBe('else');
    });
    
    test('completed does not fall back to data', () => {
        const handlers = {data: (n: number) => `data ${n}`};
        
        expect(dispatchPartial(streamCompleted(1), handlers, () => 'else')).toBe('else');
        expect(dispatchPartial(streamCompleted(1), {completed: (n) => `done ${n}`}, () => 'else'))
            .toBe('done 1');
    });
});

describe('testing `dispatchWithPrevious`', () => {
    const handlers = {
        idle: () => 'idle',
        loading: (previous: number | undefined) => `loading ${previous}`,
        data: (n: number) => `data ${n}`,
        error: (error: unknown, _: string | undefined, previous: number | undefined) =>
            `error ${String(error)} ${previous}`
    };
    
    test('passes previous data', () => {
        expect(dispatchWithPrevious(loading(1), handlers)).toBe('loading 1');
        expect(dispatchWithPrevious(loading<number>(), handlers)).toBe('loading undefined');
        expect(dispatchWithPrevious(failure('bad', undefined, 2), handlers)).toBe('error bad 2');
        expect(dispatchWithPrevious(data(3), handlers)).toBe('data 3');
        expect(dispatchWithPrevious(idle(), handlers)).toBe('idle');
        expect(dispatchWithPrevious(streamCompleted(4), handlers)).toBe('data 4');
    });
});

describe('testing predicates and `currentData`', () => {
    const states: AsyncState<number>[] = [
        idle(), loading(1), data(2), failure('bad', undefined, 3), streamCompleted(4)
    ];
    
    test('currentData()', () => {
        expect(states.map(currentData)).toEqual([undefined, 1, 2, 3, 4]);
    });
    
    test('predicates', () => {
        expect(states.map(isIdle)).toEqual([true, false, false, false, false]);
        expect(states.map(isLoading)).toEqual([false, true, false, false, false]);
        expect(states.map(hasData)).toEqual([false, false, true, false, false]);
        expect(states.map(hasError)).toEqual([false, false, false, true, false]);
        expect(states.map(isCompleted)).toEqual([false, false, false, false, true]);
    });
    
    test('predicates narrow', () => {
        const state: AsyncState<number> = data(5);
        
        expect(hasData(state) ? state.data : undefined).toBe(5);
    });
});
