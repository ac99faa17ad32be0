import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractTables } from '../tables.js';

describe('extractTables', () => {
  it('finds a single table', () => {
    assert.deepEqual(extractTables('SELECT * FROM users'), ['users']);
  });

  it('strips backticks from qualified names', () => {
    assert.deepEqual(
      extractTables(
        'SELECT o.id FROM `p.d.orders` o JOIN `p.d.customers` AS c ON o.cid = c.id WHERE c.x = 1',
      ),
      ['p.d.orders', 'p.d.customers'],
    );
  });

  it('joins dotted and partly quoted names', () => {
    assert.deepEqual(extractTables('SELECT * FROM proj.ds.t1 LEFT JOIN ds.t2 USING (id)'), [
      'proj.ds.t1',
      'ds.t2',
    ]);
    assert.deepEqual(extractTables('SELECT * FROM `p`.ds.`t`'), ['p.ds.t']);
  });

  it('looks inside subqueries', () => {
    assert.deepEqual(extractTables('SELECT * FROM (SELECT a FROM inner_t) sub'), ['inner_t']);
  });

  it('ignores FROM inside function calls', () => {
    assert.deepEqual(extractTables('SELECT EXTRACT(YEAR FROM ts) AS y FROM `p.d.orders`'), ['p.d.orders']);
    assert.deepEqual(
      extractTables('SELECT SUBSTR(name FROM 2) FROM users WHERE id IN (SELECT uid FROM banned)'),
      ['users', 'banned'],
    );
  });

  it('reports each table once, in first-seen order', () => {
    assert.deepEqual(extractTables('SELECT * FROM b UNION ALL SELECT * FROM a UNION ALL SELECT * FROM b'), [
      'b',
      'a',
    ]);
  });

  it('includes CTE names it sees after FROM', () => {
    assert.deepEqual(extractTables('WITH x AS (SELECT * FROM base) SELECT * FROM x'), ['base', 'x']);
  });

  it('returns nothing when there is no FROM', () => {
    assert.deepEqual(extractTables('SELECT 1'), []);
  });
});
