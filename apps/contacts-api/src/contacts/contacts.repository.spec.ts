import { Queryable } from '@contactbook/common/database';
import { ContactsRepository } from './contacts.repository';

const timestamp = new Date('2026-05-01T08:00:00Z');

function row(overrides: Record<string, unknown> = {}) {
  return {
    id: 3,
    user_id: 5,
    first_name: 'Wade',
    last_name: 'Wilson',
    email: 'wade@email.com',
    phone: '+1 555 0100',
    birthday: '1991-02-29',
    additional_info: null,
    created_at: timestamp,
    updated_at: timestamp,
    ...overrides,
  };
}

describe('ContactsRepository', () => {
  const repository = new ContactsRepository();
  let query: jest.Mock;
  let db: Queryable;

  beforeEach(() => {
    query = jest.fn().mockResolvedValue({ rows: [row()], rowCount: 1 });
    db = { query };
  });

  it('should insert with the owner id and null optionals', async () => {
    const contact = await repository.create(db, 5, {
      first_name: 'Wade',
      last_name: 'Wilson',
      email: 'wade@email.com',
      phone: '+1 555 0100',
    });

    expect(contact.id).toBe(3);
    expect(query.mock.calls[0][1]).toEqual([5, 'Wade', 'Wilson', 'wade@email.com', '+1 555 0100', null, null]);
  });

  it('should scope a search without filters to the owner', async () => {
    await repository.search(db, 5, {});

    expect(query.mock.calls[0][0]).toContain('WHERE user_id = $1\n');
    expect(query.mock.calls[0][1]).toEqual([5]);
  });

  it('should match names and emails case-insensitively with escaped wildcards', async () => {
    await repository.search(db, 5, { name: 'wad', email: '50%_off' });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain(
      'WHERE user_id = $1 AND (first_name ILIKE $2 OR last_name ILIKE $2) AND email ILIKE $3',
    );
    expect(params).toEqual([5, '%wad%', '%50\\%\\_off%']);
  });

  it('should look up by id and owner', async () => {
    query.mockResolvedValue({ rows: [] });

    await expect(repository.findById(db, 9, 3)).resolves.toBeNull();
    expect(query.mock.calls[0][1]).toEqual([3, 9]);
  });

  it('should update only the fields that were given', async () => {
    await repository.update(db, 5, 3, { phone: '555', birthday: null });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('SET phone = $3, birthday = $4, updated_at = now()');
    expect(sql).toContain('WHERE id = $1 AND user_id = $2');
    expect(params).toEqual([3, 5, '555', null]);
  });

  it('should read the contact when the update is empty', async () => {
    const contact = await repository.update(db, 5, 3, {});

    expect(contact?.first_name).toBe('Wade');
    expect(query.mock.calls[0][0]).toContain('SELECT');
    expect(query.mock.calls[0][1]).toEqual([3, 5]);
  });

  it('should report whether a row was deleted', async () => {
    await expect(repository.delete(db, 5, 3)).resolves.toBe(true);

    query.mockResolvedValue({ rows: [], rowCount: 0 });
    await expect(repository.delete(db, 5, 3)).resolves.toBe(false);
  });

  it('should list only contacts with a birthday', async () => {
    await repository.listWithBirthdays(db, 5);

    expect(query.mock.calls[0][0]).toContain('birthday IS NOT NULL');
    expect(query.mock.calls[0][1]).toEqual([5]);
  });
});
