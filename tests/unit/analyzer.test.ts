import { describe, expect, it } from 'vitest';
import { analyzeProject } from '../../src/lookml/analyzer';
import type { ProjectCorpus, ProjectSettings } from '../../src/lookml/types';

const settings: ProjectSettings = {
  defaultProject: 'dp',
  defaultDataset: 'dd',
  snapshotProject: 'sp',
  snapshotDataset: 'sd',
};

const viewFile = `
view: orders {
  sql_table_name: \`my-proj\`.\`ds\`.\`orders\` ;;
}

view: orders__line_items {
  dimension: id {}
}

view: customers {
  sql_table_name: proj.ds.customers ;;
}

view: order_facts {
  derived_table: {
    sql: SELECT * FROM proj.ds.orders o JOIN proj.ds.customers c ON o.id = c.id ;;
  }
}

view: monthly {
  derived_table: {
    explore_source: orders {
      column: id {}
    }
  }
}

view: users_snapshot {}

view: items {}

view: customers_alias {
  sql_table_name: proj.ds.own ;;
}
`;

const modelFile = `
explore: orders {
  join: buyers {
    from: customers
    sql_on: \${orders.customer_id} = \${buyers.id} ;;
  }
  join: items {
    sql: LEFT JOIN UNNEST(\${orders.items}) AS items ;;
  }
  join: order_facts { sql_on: 1 = 1 ;; }
}

explore: vip {
  from: customers
}

explore: ghosts {
  join: phantom { from: nowhere }
}

explore: customers_alias {
  from: customers
}
`;

const corpus: ProjectCorpus = {
  viewFiles: [{ path: 'views/shop.view.lkml', text: viewFile }],
  modelFiles: [{ path: 'models/shop.model.lkml', text: modelFile }],
};

describe('analyzer', () => {
  const result = analyzeProject(corpus, settings);
  const view = (name: string) => result.views.get(name);

  describe('WHEN analyzing a project', () => {
    it('SHOULD classify a per-part backticked sql_table_name as native', () => {
      expect(view('orders')).toMatchObject({ citationType: 'native', primaryTable: 'my-proj.ds.orders' });
    });

    it('SHOULD pick the shortest table for derived SQL without a name match', () => {
      expect(view('order_facts')).toMatchObject({
        citationType: 'derived_sql',
        primaryTable: 'proj.ds.orders',
        additionalTables: ['proj.ds.customers'],
        tieBreak: 'shortest_name',
      });
    });

    it('SHOULD copy the parent tables onto a nested view', () => {
      expect(view('orders__line_items')).toMatchObject({
        citationType: 'nested',
        primaryTable: 'my-proj.ds.orders',
        additionalTables: [],
      });
    });

    it('SHOULD classify explore-sourced and unnest views without tables', () => {
      expect(view('monthly')).toMatchObject({ citationType: 'derived_explore', primaryTable: '', additionalTables: [] });
      expect(view('items')).toMatchObject({ citationType: 'unnest', primaryTable: '', additionalTables: [] });
    });

    it('SHOULD give aliases the final tables of their base', () => {
      expect(view('buyers')).toMatchObject({
        citationType: 'derived_from',
        derivedFrom: 'customers',
        primaryTable: 'proj.ds.customers',
      });
      expect(view('vip')).toMatchObject({ citationType: 'derived_from', primaryTable: 'proj.ds.customers' });
    });

    it('SHOULD give aliases of undeclared views no tables', () => {
      expect(view('phantom')).toMatchObject({ citationType: 'derived_from', primaryTable: '', additionalTables: [] });
      expect(result.views.has('nowhere')).toBe(false);
    });

    it('SHOULD let a view own sql_table_name win over an alias declaration', () => {
      expect(view('customers_alias')).toMatchObject({ citationType: 'native', primaryTable: 'proj.ds.own' });
      expect(view('customers_alias')?.derivedFrom).toBeUndefined();
    });

    it('SHOULD synthesize a snapshot table', () => {
      expect(view('users_snapshot')).toMatchObject({ citationType: 'derived', primaryTable: 'sp.sd.users_snapshot' });
    });

    it('SHOULD return the explore graph, aliases and no warnings', () => {
      expect(Array.from(result.explores.get('orders')?.views ?? [])).toEqual(['orders', 'buyers', 'items', 'order_facts']);
      expect(result.aliases.map((relation) => `${relation.alias}->${relation.base}`)).toEqual([
        'buyers->customers',
        'vip->customers',
        'phantom->nowhere',
        'customers_alias->customers',
      ]);
      expect(Array.from(result.unnestViews)).toEqual(['items']);
      expect(result.warnings).toEqual([]);
    });
  });

  describe('invariants', () => {
    const views = Array.from(result.views.values());

    it('SHOULD leave unnest and derived_explore views without tables', () => {
      for (const entry of views.filter((v) => v.citationType === 'unnest' || v.citationType === 'derived_explore')) {
        expect(entry.primaryTable).toBe('');
        expect(entry.additionalTables).toEqual([]);
      }
    });

    it('SHOULD never repeat the primary table among additional tables', () => {
      for (const entry of views) {
        const lowered = entry.additionalTables.map((table) => table.toLowerCase());
        expect(lowered).not.toContain(entry.primaryTable.toLowerCase());
        expect(new Set(lowered).size).toBe(lowered.length);
      }
    });

    it('SHOULD keep alias tables equal to their base tables', () => {
      for (const { alias, base } of result.aliases) {
        const aliasView = result.views.get(alias);
        const baseView = result.views.get(base);
        // Bases whose tables are only inferred from names pass nothing on.
        const inferred = baseView?.citationType === 'derived' || baseView?.citationType === 'nested';
        if (aliasView?.citationType === 'derived_from' && baseView && !inferred) {
          expect(aliasView.primaryTable).toBe(baseView.primaryTable);
        }
      }
    });
  });

  describe('WHEN an alias base has no source of its own', () => {
    const aliasCorpus: ProjectCorpus = {
      viewFiles: [
        {
          path: 'views/people.view.lkml',
          text: [
            'view: users { dimension: id {} }',
            'view: customers { sql_table_name: proj.ds.customers ;; }',
            'view: buyers__address { dimension: city {} }',
          ].join('\n'),
        },
      ],
      modelFiles: [
        {
          path: 'models/market.model.lkml',
          text: [
            'explore: listings {',
            '  join: seller { from: users }',
            '  join: buyers { from: customers }',
            '}',
          ].join('\n'),
        },
      ],
    };
    const aliasResult = analyzeProject(aliasCorpus, settings);

    it('SHOULD leave the alias without tables instead of inheriting a guessed one', () => {
      expect(aliasResult.views.get('users')).toMatchObject({ citationType: 'derived', primaryTable: 'dp.dd.users' });
      expect(aliasResult.views.get('seller')).toMatchObject({
        citationType: 'derived_from',
        derivedFrom: 'users',
        primaryTable: '',
        additionalTables: [],
      });
    });

    it('SHOULD let a nested child of an alias inherit the alias tables', () => {
      expect(aliasResult.views.get('buyers')).toMatchObject({
        citationType: 'derived_from',
        primaryTable: 'proj.ds.customers',
      });
      expect(aliasResult.views.get('buyers__address')).toMatchObject({
        citationType: 'nested',
        primaryTable: 'proj.ds.customers',
        additionalTables: [],
      });
    });
  });

  describe('WHEN the corpus is malformed', () => {
    it('SHOULD return partial results with warnings instead of throwing', () => {
      const broken: ProjectCorpus = {
        viewFiles: [{ path: 'views/a.view.lkml', text: 'view: good { sql_table_name: p.d.good ;; }\nview: bad {\n' }],
        modelFiles: [{ path: 'models/m.model.lkml', text: 'explore: half {' }],
      };
      const partial = analyzeProject(broken, settings);

      expect(partial.views.get('good')).toMatchObject({ citationType: 'native', primaryTable: 'p.d.good' });
      expect(partial.views.get('bad')).toMatchObject({ citationType: 'derived', primaryTable: 'dp.dd.bad' });
      expect(partial.warnings.map((warning) => warning.message)).toEqual([
        'view bad has no closing brace',
        'explore half has no closing brace',
      ]);
    });
  });
});
