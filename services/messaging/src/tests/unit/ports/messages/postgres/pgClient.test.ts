import { describe, expect, test, vi } from 'vitest';

import { migrate } from '../../../../../ports/messages/postgres';

describe('migrate', () => {
  test('runs the bundled schema in one query', async () => {
    const query = vi.fn(async (_text: string, _params?: unknown[]) => ({ rows: [] }));

    await migrate({ query });

    expect(query).toHaveBeenCalledTimes(1);
    const [ddl] = query.mock.calls[0];
    expect(ddl).toContain('create table if not exists messaging.messages');
  });
});
