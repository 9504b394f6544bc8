import { describe, expect, it } from 'vitest';
import { AnalysisError, type AnalysisUnit, type MappingDeclaration } from '@mapcheck/core';
import { FixError, MappingAnalyzer } from '@mapcheck/analyzer';
import { MappingTools } from '../src/tools.js';
import { UnitStore } from '../src/unit-store.js';
import { ordersUnit } from './fixtures.js';

function setup(analyzer = new MappingAnalyzer()) {
  const store = new UnitStore();
  store.add(ordersUnit(), '/units/orders.json');
  return { store, tools: new MappingTools(store, analyzer) };
}

/** Three identical Order -> OrderDto declarations; d2 and d3 are duplicates */
function duplicatedUnit(): AnalysisUnit {
  const declaration = (id: string): MappingDeclaration => ({
    id,
    sourceType: 'Order',
    destType: 'OrderDto',
    memberConfigs: [{ kind: 'ignore', destMember: 'Id' }],
    hasReverseMap: false,
  });
  return { ...ordersUnit(), declarations: [declaration('d1'), declaration('d2'), declaration('d3')] };
}

async function rejection(pending: Promise<unknown>): Promise<unknown> {
  try {
    await pending;
  } catch (err) {
    return err;
  }
  throw new Error('expected a rejection');
}

describe('MappingTools', () => {
  it('lists loaded units', () => {
    const { tools } = setup();
    expect(tools.listUnits()).toEqual({
      units: [{ id: 'orders', origin: '/units/orders.json', shapes: 2, declarations: 1, analyzed: false }],
      count: 1,
    });
  });

  it('lists rules with their configured severity', () => {
    const { tools } = setup(new MappingAnalyzer({ rules: { RedundantMapFrom: 'off', CaseSensitivityMismatch: 'error' } }));
    const { rules, count } = tools.listRules();

    expect(count).toBe(14);
    expect(rules.find((r) => r.id === 'RedundantMapFrom')?.effectiveSeverity).toBe('off');
    expect(rules.find((r) => r.id === 'CaseSensitivityMismatch')?.effectiveSeverity).toBe('error');
    expect(rules.find((r) => r.id === 'PropertyTypeMismatch')?.effectiveSeverity).toBe('error');
  });

  it('analyzes a unit and indexes its diagnostics', async () => {
    const { tools } = setup();
    const result = await tools.analyzeUnit('orders');

    expect(result.summary.status).toBe('errors');
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      index: 0,
      ruleId: 'PropertyTypeMismatch',
      declarationId: 'order-to-dto',
      member: 'Id',
    });
    expect(tools.listUnits().units[0]?.analyzed).toBe(true);
  });

  it('suggests fixes, analyzing first when needed', async () => {
    const { tools } = setup();
    const result = await tools.suggestFixes('orders', 0);

    expect(result.diagnostic.ruleId).toBe('PropertyTypeMismatch');
    expect(result.fixes).toEqual([
      {
        equivalence_key: 'PropertyTypeMismatch:to-string',
        title: 'Convert Id with ToString()',
        preview: 'ForMember(dest => dest.Id, opt => opt.MapFrom(src => src.Id.ToString()))',
      },
      {
        equivalence_key: 'PropertyTypeMismatch:ignore',
        title: 'Ignore Id',
        preview: 'ForMember(dest => dest.Id, opt => opt.Ignore())',
      },
    ]);
  });

  it('applies a fix to the session copy and re-analyzes', async () => {
    const { tools } = setup();
    await tools.analyzeUnit('orders');

    const applied = await tools.applyFix('orders', 0, 'PropertyTypeMismatch:ignore');

    expect(applied.result.summary.status).toBe('clean');
    expect(applied.result.diagnostics).toEqual([]);
    expect(tools.getUnit('orders').declarations[0]?.memberConfigs).toEqual([{ kind: 'ignore', destMember: 'Id' }]);
    expect(tools.listUnits().units[0]).toMatchObject({ origin: '/units/orders.json', analyzed: true });
  });

  it('reports unknown units', async () => {
    const { tools } = setup();
    const err = await rejection(tools.analyzeUnit('invoices'));

    expect(err).toBeInstanceOf(AnalysisError);
    expect(err).toMatchObject({
      code: 'UNIT_NOT_FOUND',
      suggestion: 'Use list_units to see available units (orders)',
    });
  });

  it('reports diagnostic indexes outside the latest report', async () => {
    const { tools } = setup();
    const err = await rejection(tools.suggestFixes('orders', 5));

    expect(err).toMatchObject({
      code: 'DIAGNOSTIC_NOT_FOUND',
      message: "Unit 'orders' has no diagnostic at index 5 (1 reported)",
    });
  });

  it('reports unknown fix keys', async () => {
    const { tools } = setup();
    const err = await rejection(tools.applyFix('orders', 0, 'PropertyTypeMismatch:parse'));

    expect(err).toBeInstanceOf(FixError);
    expect(err).toMatchObject({ code: 'UNKNOWN_FIX' });
  });

  it('rejects a cancelled analysis and keeps the unit unanalyzed', async () => {
    const { tools } = setup();
    const controller = new AbortController();
    controller.abort();

    const err = await rejection(tools.analyzeUnit('orders', controller.signal));

    expect(err).toMatchObject({ code: 'ANALYSIS_CANCELLED', unitId: 'orders' });
    expect(tools.listUnits().units[0]?.analyzed).toBe(false);
  });

  it('keeps the report of the fixed unit when an older pass finishes later', async () => {
    const store = new UnitStore();
    store.add(duplicatedUnit());
    const tools = new MappingTools(store, new MappingAnalyzer());
    await tools.analyzeUnit('orders');

    const [stale, applied] = await Promise.all([
      tools.analyzeUnit('orders'),
      tools.applyFix('orders', 0, 'DuplicateMapping:remove-declaration'),
    ]);

    expect(stale.diagnostics.map((d) => d.declarationId)).toEqual(['d2', 'd3']);
    expect(applied.result.diagnostics.map((d) => d.declarationId)).toEqual(['d3']);
    expect(tools.getUnit('orders').declarations.map((d) => d.id)).toEqual(['d1', 'd3']);
    expect(store.getReport('orders')?.diagnostics.map((d) => d.declarationId)).toEqual(['d3']);
  });

  it('refuses a fix prepared against a unit that has since changed', async () => {
    const store = new UnitStore();
    store.add(duplicatedUnit());
    const tools = new MappingTools(store, new MappingAnalyzer());
    await tools.analyzeUnit('orders');

    const [first, second] = await Promise.allSettled([
      tools.applyFix('orders', 0, 'DuplicateMapping:remove-declaration'),
      tools.applyFix('orders', 0, 'DuplicateMapping:remove-declaration'),
    ]);

    expect(first.status).toBe('fulfilled');
    expect(second).toMatchObject({ status: 'rejected', reason: { code: 'UNIT_CHANGED' } });
    expect(tools.getUnit('orders').declarations.map((d) => d.id)).toEqual(['d1', 'd3']);
  });
});

describe('UnitStore', () => {
  it('stores a report only for the unit it was computed from', async () => {
    const store = new UnitStore();
    const original = ordersUnit();
    store.add(original);
    const report = await new MappingAnalyzer().analyze(original);

    store.replace({ ...original, declarations: [] });

    expect(store.setReport(original, report)).toBe(false);
    expect(store.getReport('orders')).toBeUndefined();
    expect(store.setReport(store.getOrThrow('orders'), report)).toBe(true);
    expect(store.getReport('orders')).toBe(report);
  });
});
