import {ValueCell} from '../lib/cell.js';
import {ListCell} from '../lib/list.js';
import {MapCell} from '../lib/map.js';
import {SetCell} from '../lib/set.js';
import {TaskCell} from '../lib/task.js';
import {StreamCell} from '../lib/stream.js';
import {ViewModel} from '../lib/view-model.js';
import {DiagnosticsCollector} from '../lib/diagnostics.js';
import {Notifier} from '../lib/notifier.js';
import {idle, streamCompleted} from '../lib/async-state.js';

class Ticker extends Notifier {}

class ProfileViewModel extends ViewModel {
    readonly name = this.own('name', new ValueCell('test-user'));
    readonly nameLength = this.own('nameLength', this.name.select((name) => name.length));
    readonly tags = this.own('tags', new ListCell(['a', 'b']));
    readonly scores = this.own('scores', new MapCell([['x', 1]]));
    readonly ids = this.own('ids', new SetCell([1, 2, 3]));
    readonly load = this.own('load', new TaskCell<string>());
    readonly feed = this.own('feed', new StreamCell<number>(idle()));
    readonly ticker = this.own('ticker', new Ticker());
}

describe('testing `DiagnosticsCollector`', () => {
    test('snapshot()', () => {
        const collector = new DiagnosticsCollector();
        const vm = new ProfileViewModel();
        
        const id = collector.register(vm);
        
        expect(collector.snapshot()).toEqual([{
            id,
            type: 'ProfileViewModel',
            disposed: false,
            properties: [
                {name: 'name', type: 'ValueCell', value: 'test-user'},
                {name: 'nameLength', type: 'SelectedCell', value: '9'},
                {name: 'tags', type: 'ListCell', value: 'List (2 items)'},
                {name: 'scores', type: 'MapCell', value: 'Map (1 entries)'},
                {name: 'ids', type: 'SetCell', value: 'Set (3 items)'},
                {name: 'load', type: 'TaskCell', value: 'Loading...'},
                {name: 'feed', type: 'StreamCell', value: 'Idle'},
                {name: 'ticker', type: 'Ticker', value: ''}
            ]
        }]);
    });
    
    test('ids are per registration', () => {
        const collector = new DiagnosticsCollector();
        
        const first = collector.register(new ProfileViewModel());
        const second = collector.register(new ProfileViewModel());
        
        expect(second).not.toBe(first);
        expect(collector.snapshot().map((snapshot) => snapshot.id)).toEqual([first, second]);
    });
    
    test('unregister()', () => {
        const collector = new DiagnosticsCollector();
        const id = collector.register(new ProfileViewModel());
        
        collector.unregister(id);
        
        expect(collector.snapshot()).toEqual([]);
        expect(collector.inspect(id)).toBeUndefined();
    });
    
    test('snapshots follow the cells', () => {
        const collector = new DiagnosticsCollector();
        const vm = new ProfileViewModel();
        const id = collector.register(vm);
        
        vm.tags.add('c');
        vm.load.setData('done');
        vm.feed.bind([4]);
        vm.dispose();
        
        const [snapshot] = collector.snapshot();
        expect(snapshot.disposed).toBe(true);
        expect(snapshot.id).toBe(id);
        expect(snapshot.properties.map((property) => property.value)).toEqual([
            'test-user', '9', 'List (3 items)', 'Map (1 entries)', 'Set (3 items)',
            'Data: done', 'Done: 4', ''
        ]);
    });
    
    test('describe() of async states', () => {
        const collector = new DiagnosticsCollector();
        const task = new TaskCell<string>();
        const stream = new StreamCell<number>(streamCompleted());
        
        task.setError(new Error('test failure'));
        expect(collector.describe(task)).toBe('Error: test failure');
        
        task.setError('plain');
        expect(collector.describe(task)).toBe('Error: plain');
        
        expect(collector.describe(stream)).toBe('Done');
    });
    
    test('descriptions are truncated', () => {
        const collector = new DiagnosticsCollector({maxLength: 5});
        const vm = new ProfileViewModel();
        const id = collector.register(vm);
        vm.load.setData('abcdefgh');
        
        expect(collector.describe(vm.name)).toBe('test-...');
        expect(collector.describe(vm.load)).toBe('Data: abcde...');
        
        const inspected = collector.inspect(id);
        expect(inspected?.properties[0]).toEqual({
            name: 'name', type: 'ValueCell', value: 'test-...', description: 'test-user'
        });
        expect(inspected?.properties[5].description).toBe('Data: abcdefgh');
    });
    
    test('typeName()', () => {
        const collector = new DiagnosticsCollector();
        
        expect(collector.typeName(new ValueCell(1))).toBe('ValueCell');
        expect(collector.typeName(new Ticker())).toBe('Ticker');
    });
});
