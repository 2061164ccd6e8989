import {test as tst, fc} from '@fast-check/jest';

import {ListCell} from '../lib/list.js';
import {MapCell} from '../lib/map.js';
import {SetCell} from '../lib/set.js';

import {arbOps, isValidFor, applyToArray, applyToList, countNotifications} from './test-util.js';

const arbInitial = fc.array(fc.integer(), {maxLength: 10});

describe('testing `ListCell`', () => {
    tst.prop({initial: arbInitial, ops: arbOps(12)})(
        'single-element mutators agree with arrays and notify once each',
        ({initial, ops}) => {
            const list = new ListCell(initial);
            const vs = initial.slice();
            const counter = countNotifications(list);
            
            let applied = 0;
            for (const op of ops) {
                if (isValidFor(vs.length, op)) {
                    applyToList(list, op);
                    applyToArray(vs, op);
                    ++applied;
                }
            }
            
            expect(list.toArray()).toEqual(vs);
            expect(counter.count).toBe(applied);
        }
    );
    
    tst.prop({initial: arbInitial, ops: arbOps(12)})(
        'batch() notifies exactly once',
        ({initial, ops}) => {
            const list = new ListCell(initial);
            const vs = initial.slice();
            const counter = countNotifications(list);
            
            list.batch((handle) => {
                for (const op of ops) {
                    if (isValidFor(handle.length, op)) { applyToArray(handle, op); }
                }
            });
            for (const op of ops) {
                if (isValidFor(vs.length, op)) { applyToArray(vs, op); }
            }
            
            expect(list.toArray()).toEqual(vs);
            expect(counter.count).toBe(1);
        }
    );
    
    tst.prop({initial: arbInitial, ops: arbOps(12)})(
        'a throwing batch() leaves the list as it was',
        ({initial, ops}) => {
            const list = new ListCell(initial);
            const counter = countNotifications(list);
            
            expect(() => list.batch((handle) => {
                for (const op of ops) {
                    if (isValidFor(handle.length, op)) { applyToArray(handle, op); }
                }
                throw new Error('test failure');
            })).toThrow('test failure');
            
            expect(list.toArray()).toEqual(initial);
            expect(counter.count).toBe(0);
        }
    );
    
    tst.prop({initial: arbInitial, added: fc.array(fc.integer())})(
        'silent() does not notify until refresh()',
        ({initial, added}) => {
            const list = new ListCell(initial);
            const counter = countNotifications(list);
            
            list.silent((handle) => { handle.push(...added); });
            expect(list.toArray()).toEqual([...initial, ...added]);
            expect(counter.count).toBe(0);
            
            list.refresh();
            expect(counter.count).toBe(1);
        }
    );
    
    tst.prop({initial: arbInitial, threshold: fc.integer()})(
        'removeWhere() notifies iff something was removed',
        ({initial, threshold}) => {
            const list = new ListCell(initial);
            const counter = countNotifications(list);
            
            list.removeWhere((v) => v > threshold);
            
            const kept = initial.filter((v) => v <= threshold);
            expect(list.toArray()).toEqual(kept);
            expect(counter.count).toBe(kept.length === initial.length ? 0 : 1);
        }
    );
});

describe('testing `SetCell`', () => {
    tst.prop({initial: arbInitial, added: fc.array(fc.integer(), {maxLength: 10})})(
        'addAll() notifies iff membership changed',
        ({initial, added}) => {
            const set = new SetCell(initial);
            const counter = countNotifications(set);
            
            set.addAll(added);
            
            const expected = new Set([...initial, ...added]);
            expect(set.toArray()).toEqual(Array.from(expected));
            expect(counter.count).toBe(expected.size === new Set(initial).size ? 0 : 1);
        }
    );
});

describe('testing `MapCell`', () => {
    tst.prop({entries: fc.array(fc.tuple(fc.string(), fc.integer()), {maxLength: 10})})(
        'setAll() agrees with Map and notifies iff given entries',
        ({entries}) => {
            const map = new MapCell<string, number>();
            const counter = countNotifications(map);
            
            map.setAll(entries);
            
            expect(Array.from(map)).toEqual(Array.from(new Map(entries)));
            expect(counter.count).toBe(entries.length === 0 ? 0 : 1);
        }
    );
});
