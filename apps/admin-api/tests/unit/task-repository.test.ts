import { TaskRepository } from '../../src/repositories/task.repository';
import { FakePool } from '../helpers/db';
import { makeTask } from '../helpers/fakes';

describe('TaskRepository', () => {
    let pool: FakePool;
    let repo: TaskRepository;

    beforeEach(() => {
        pool = new FakePool();
        repo = new TaskRepository(pool.asPool());
    });

    it('creates a task with its definition stored as JSON', async () => {
        const row = makeTask({ id: '5' });
        pool.respond([row]);

        const task = await repo.create({ name: 'nightly-crawl', definition: { seeds: ['https://example.test'] } }, 'auth0|owner-1');

        expect(task).toBe(row);
        expect(pool.queries).toEqual([{
            text: 'INSERT INTO tasks (name, definition, owner) VALUES ($1, $2, $3) RETURNING *',
            values: ['nightly-crawl', '{"seeds":["https://example.test"]}', 'auth0|owner-1'],
        }]);
    });

    it('stores a missing definition as JSON null', async () => {
        pool.respond([makeTask()]);

        await repo.create({ name: 'empty', definition: undefined }, 'auth0|owner-1');

        expect(pool.queries[0].values).toEqual(['empty', 'null', 'auth0|owner-1']);
    });

    it('finds only live tasks by id', async () => {
        pool.respond([]);

        await expect(repo.findById('9')).resolves.toBeNull();
        expect(pool.queries[0]).toEqual({
            text: 'SELECT * FROM tasks WHERE id = $1 AND deleted_at IS NULL',
            values: ['9'],
        });
    });

    it('lists an owner\'s live tasks oldest first', async () => {
        const rows = [makeTask({ id: '1' }), makeTask({ id: '2' })];
        pool.respond(rows);

        await expect(repo.findByOwner('auth0|owner-1')).resolves.toEqual(rows);
        expect(pool.queries[0].text)
            .toBe('SELECT * FROM tasks WHERE owner = $1 AND deleted_at IS NULL ORDER BY created_at ASC, id ASC');
    });

    it('updates name and definition of a live task', async () => {
        const row = makeTask({ id: '3', name: 'renamed' });
        pool.respond([row]);

        await expect(repo.update('3', { name: 'renamed', definition: { depth: 2 } })).resolves.toBe(row);
        expect(pool.queries[0]).toEqual({
            text: 'UPDATE tasks SET name = $1, definition = $2, updated_at = NOW() WHERE id = $3 AND deleted_at IS NULL RETURNING *',
            values: ['renamed', '{"depth":2}', '3'],
        });
    });

    it('reports a missing task on update as null', async () => {
        pool.respond([]);

        await expect(repo.update('999', { name: 'x', definition: {} })).resolves.toBeNull();
    });

    it('soft-deletes and reports whether a row was hit', async () => {
        pool.respond([], 1).respond([], 0);

        await expect(repo.softDelete('3')).resolves.toBe(true);
        await expect(repo.softDelete('3')).resolves.toBe(false);
        expect(pool.queries[0].text).toBe('UPDATE tasks SET deleted_at = NOW() WHERE id = $1 AND deleted_at IS NULL');
    });

    it('treats a missing row count as no rows', async () => {
        pool.respond([], null);

        await expect(repo.softDelete('3')).resolves.toBe(false);
    });

    it('propagates driver errors', async () => {
        jest.spyOn(pool, 'query').mockRejectedValue(new Error('connection terminated'));

        await expect(repo.findById('1')).rejects.toThrow('connection terminated');
    });
});
