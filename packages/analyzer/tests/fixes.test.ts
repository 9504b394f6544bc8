import { describe, expect, it } from 'vitest';
import {
  accessor,
  literal,
  memberAccess,
  methodCall,
  printExpr,
  type AnalysisUnit,
  type Diagnostic,
  type Expr,
  type MemberConfig,
} from '@mapcheck/core';
import { MappingAnalyzer } from '../src/analysis/mapping-analyzer.js';
import { FixError } from '../src/errors/index.js';
import { POPULATE_MARKER, applyEdit, defaultValueFor, findClosestMember } from '../src/fixes/index.js';
import { DEFAULT_FUZZY_MATCH } from '../src/types/index.js';
import {
  arrayOf,
  bool,
  dateTime,
  decimal,
  declaration,
  int,
  listOf,
  mapFrom,
  mapFromSource,
  member,
  nullable,
  shape,
  str,
  unit,
  unresolved,
  userType,
} from './helpers.js';

const analyzer = new MappingAnalyzer();

function simpleUnit(
  sourceMembers: ReturnType<typeof member>[],
  destMembers: ReturnType<typeof member>[],
  memberConfigs: MemberConfig[] = []
): AnalysisUnit {
  return unit(
    [shape('Source', ...sourceMembers), shape('Destination', ...destMembers)],
    [declaration('d1', 'Source', 'Destination', { memberConfigs })]
  );
}

async function onlyDiagnostic(u: AnalysisUnit): Promise<Diagnostic> {
  const report = await analyzer.analyze(u);
  expect(report.diagnostics).toHaveLength(1);
  const [diagnostic] = report.diagnostics;
  if (!diagnostic) throw new Error('expected a diagnostic');
  return diagnostic;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function captured(name: string, typeName?: string): Expr {
  return typeName ? { kind: 'captured', name, typeName } : { kind: 'captured', name };
}

describe('defaultValueFor', () => {
  it('produces type-appropriate literals', () => {
    const printed = (type: Parameters<typeof defaultValueFor>[0]) => {
      const value = defaultValueFor(type);
      return value ? printExpr(value) : undefined;
    };

    expect(printed(str)).toBe('""');
    expect(printed(bool)).toBe('false');
    expect(printed(nullable(int))).toBe('0');
    expect(printed(dateTime)).toBe('DateTime.MinValue');
    expect(printed(arrayOf(int))).toBe('Array.Empty<int>()');
    expect(printed(listOf(str))).toBe('new List<string>()');
    expect(printed(userType('Address'))).toBe('new Address()');
    expect(printed(unresolved('Vendor.Thing'))).toBeUndefined();
  });
});

describe('findClosestMember', () => {
  it('picks the smallest case-insensitive distance', () => {
    const result = findClosestMember('Name', [member('Nmae', str), member('Namr', str)], DEFAULT_FUZZY_MATCH);
    expect(result?.member.name).toBe('Namr');
    expect(result?.distance).toBe(1);
  });

  it('keeps the first candidate on ties', () => {
    const result = findClosestMember('Name', [member('Nam', str), member('Names', str)], DEFAULT_FUZZY_MATCH);
    expect(result?.member.name).toBe('Nam');
  });

  it('rejects candidates beyond the length or distance limits', () => {
    expect(findClosestMember('Title', [member('Id', int), member('Tactics', str)], DEFAULT_FUZZY_MATCH)).toBeUndefined();
  });
});

describe('type conversion fixes', () => {
  it('offers ToString() and ignore for a string destination', async () => {
    const u = simpleUnit([member('Age', int)], [member('Age', str)]);
    const diagnostic = await onlyDiagnostic(u);

    const fixes = analyzer.suggestFixes(u, diagnostic);

    expect(fixes.map((f) => f.equivalenceKey)).toEqual([
      'PropertyTypeMismatch:to-string',
      'PropertyTypeMismatch:ignore',
    ]);
    expect(fixes[0]?.preview).toBe('ForMember(dest => dest.Age, opt => opt.MapFrom(src => src.Age.ToString()))');
    expect(fixes[1]?.preview).toBe('ForMember(dest => dest.Age, opt => opt.Ignore())');
    expect(fixes[0]?.anchor).toEqual({ unitId: 'test-unit', declarationId: 'd1', destMember: 'Age' });
  });

  it('clears the diagnostic once applied and is idempotent', async () => {
    const u = simpleUnit([member('Age', int)], [member('Age', str)]);
    const diagnostic = await onlyDiagnostic(u);

    const once = analyzer.applyFix(u, diagnostic, 'PropertyTypeMismatch:to-string');
    const fixes = analyzer.suggestFixes(u, diagnostic);
    const [toString] = fixes;
    if (!toString) throw new Error('expected a fix');
    const twice = applyEdit(once, toString);

    expect(twice).toEqual(once);
    expect((await analyzer.analyze(once)).diagnostics).toEqual([]);
    expect(u.declarations[0]?.memberConfigs).toEqual([]);
  });

  it('offers Parse for a string source', async () => {
    const u = simpleUnit([member('Code', str)], [member('Code', int)]);
    const fixes = analyzer.suggestFixes(u, await onlyDiagnostic(u));

    expect(fixes.map((f) => f.equivalenceKey)).toEqual(['PropertyTypeMismatch:parse', 'PropertyTypeMismatch:ignore']);
    expect(fixes[0]?.preview).toBe('ForMember(dest => dest.Code, opt => opt.MapFrom(src => int.Parse(src.Code)))');
  });

  it('offers only ignore when no conversion applies', async () => {
    const u = simpleUnit([member('Flag', bool)], [member('Flag', dateTime)]);
    const fixes = analyzer.suggestFixes(u, await onlyDiagnostic(u));
    expect(fixes.map((f) => f.equivalenceKey)).toEqual(['PropertyTypeMismatch:ignore']);
  });

  it('projects collection elements and keeps the destination container', async () => {
    const u = simpleUnit([member('Tags', listOf(int))], [member('Tags', listOf(str))]);
    const diagnostic = await onlyDiagnostic(u);
    const fixes = analyzer.suggestFixes(u, diagnostic);

    expect(fixes.map((f) => f.equivalenceKey)).toEqual(['GenericTypeMismatch:to-string', 'GenericTypeMismatch:ignore']);
    expect(fixes[0]?.preview).toBe(
      'ForMember(dest => dest.Tags, opt => opt.MapFrom(src => src.Tags.Select(x => x.ToString()).ToList()))'
    );

    const fixed = analyzer.applyFix(u, diagnostic, 'GenericTypeMismatch:to-string');
    expect((await analyzer.analyze(fixed)).diagnostics).toEqual([]);
  });

  it('parses into an array destination with ToArray()', async () => {
    const u = simpleUnit([member('Ids', listOf(str))], [member('Ids', arrayOf(int))]);
    const fixes = analyzer.suggestFixes(u, await onlyDiagnostic(u));
    expect(fixes[0]?.preview).toBe(
      'ForMember(dest => dest.Ids, opt => opt.MapFrom(src => src.Ids.Select(x => int.Parse(x)).ToArray()))'
    );
  });
});

describe('nullable and complex fixes', () => {
  it('coalesces to the destination default', async () => {
    const u = simpleUnit([member('Name', str, { nullable: true }), member('Count', nullable(int))], [
      member('Name', str),
      member('Count', int),
    ]);
    const report = await analyzer.analyze(u);
    const previews = report.diagnostics.map((d) => analyzer.suggestFixes(u, d)[0]?.preview);

    expect(previews).toEqual([
      'ForMember(dest => dest.Name, opt => opt.MapFrom(src => src.Name ?? ""))',
      'ForMember(dest => dest.Count, opt => opt.MapFrom(src => src.Count ?? 0))',
    ]);

    let fixed = u;
    for (const diagnostic of report.diagnostics) {
      fixed = analyzer.applyFix(fixed, diagnostic, 'NullableCompatibility:coalesce');
    }
    expect((await analyzer.analyze(fixed)).diagnostics).toEqual([]);
  });

  it('offers no automatic fix for a missing nested mapping', async () => {
    const u = unit(
      [
        shape('Source', member('Address', userType('AddrA'))),
        shape('Destination', member('Address', userType('AddrB'))),
      ],
      [declaration('d1', 'Source', 'Destination')]
    );
    expect(analyzer.suggestFixes(u, await onlyDiagnostic(u))).toEqual([]);
  });
});

describe('naming fixes', () => {
  it('maps explicitly or records guidance for a case-only difference', async () => {
    const u = simpleUnit([member('name', str)], [member('Name', str)]);
    const diagnostic = await onlyDiagnostic(u);
    const fixes = analyzer.suggestFixes(u, diagnostic);

    expect(fixes.map((f) => f.equivalenceKey)).toEqual([
      'CaseSensitivityMismatch:explicit-mapping',
      'CaseSensitivityMismatch:naming-convention',
      'CaseSensitivityMismatch:rename-source',
    ]);
    expect(fixes[0]?.preview).toBe('ForMember(dest => dest.Name, opt => opt.MapFrom(src => src.name))');

    const explicit = analyzer.applyFix(u, diagnostic, 'CaseSensitivityMismatch:explicit-mapping');
    expect((await analyzer.analyze(explicit)).diagnostics).toEqual([]);

    const commented = analyzer.applyFix(u, diagnostic, 'CaseSensitivityMismatch:naming-convention');
    expect(analyzer.applyFix(commented, diagnostic, 'CaseSensitivityMismatch:naming-convention')).toEqual(commented);
    expect(commented.declarations[0]?.comments).toEqual([
      { destMember: 'Name', text: 'Source.name and Destination.Name differ only by case.' },
      { destMember: 'Name', text: 'Configure case-insensitive member name matching for this profile.' },
    ]);
  });

  it('suggests a similarly named source member for an unmapped property', async () => {
    const u = simpleUnit([member('Tittle', str)], [member('Title', str)]);
    const report = await analyzer.analyze(u);
    expect(report.diagnostics.map((d) => d.ruleId)).toEqual(['MissingDestinationProperty', 'UnmappedRequiredProperty']);
    const diagnostic = report.diagnostics.find((d) => d.ruleId === 'UnmappedRequiredProperty');
    if (!diagnostic) throw new Error('expected an unmapped member');
    const fixes = analyzer.suggestFixes(u, diagnostic);

    expect(fixes.map((f) => f.equivalenceKey)).toEqual([
      'UnmappedRequiredProperty:default-value',
      'UnmappedRequiredProperty:suggest-source-member',
    ]);
    expect(fixes[0]?.preview).toBe('ForMember(dest => dest.Title, opt => opt.MapFrom(src => ""))');
    expect(fixes[1]?.operations).toEqual([
      {
        kind: 'insert-comment',
        destMember: 'Title',
        lines: [
          'Source.Tittle looks like a match for Title.',
          'Consider ForMember(dest => dest.Title, opt => opt.MapFrom(src => src.Tittle)).',
        ],
      },
    ]);

    const fixed = analyzer.applyFix(u, diagnostic, 'UnmappedRequiredProperty:default-value');
    expect((await analyzer.analyze(fixed)).diagnostics.map((d) => d.ruleId)).toEqual(['MissingDestinationProperty']);
  });

  it('says so when no source member resembles the destination', async () => {
    const u = simpleUnit([member('Id', int)], [member('Id', int), member('Title', str)]);
    const fixes = analyzer.suggestFixes(u, await onlyDiagnostic(u));
    expect(fixes[1]?.operations).toEqual([
      {
        kind: 'insert-comment',
        destMember: 'Title',
        lines: ['No source member resembles Title.', 'Add Title to Source or map it explicitly.'],
      },
    ]);
  });

  it('removes a redundant mapping', async () => {
    const u = simpleUnit([member('Name', str)], [member('Name', str)], [mapFromSource('Name', 'Name')]);
    const diagnostic = await onlyDiagnostic(u);
    const fixed = analyzer.applyFix(u, diagnostic, 'RedundantMapFrom:remove');

    expect(fixed.declarations[0]?.memberConfigs).toEqual([]);
    expect((await analyzer.analyze(fixed)).diagnostics).toEqual([]);
  });
});

describe('data-loss fixes', () => {
  it('ignores the source member, maps it onto a similar member or leaves a note', async () => {
    const u = simpleUnit([member('Id', int), member('Titel', str)], [member('Id', int), member('Title', str, { nullable: true })]);
    const diagnostic = await onlyDiagnostic(u);
    const fixes = analyzer.suggestFixes(u, diagnostic);

    expect(fixes.map((f) => [f.equivalenceKey, f.preview])).toEqual([
      ['MissingDestinationProperty:ignore-source', 'ForSourceMember(src => src.Titel, opt => opt.DoNotValidate())'],
      ['MissingDestinationProperty:map-to-closest', 'ForMember(dest => dest.Title, opt => opt.MapFrom(src => src.Titel))'],
      [
        'MissingDestinationProperty:comment',
        '// Source.Titel has no destination member.\n// Add it to Destination or map it onto an existing member.',
      ],
    ]);
    expect(fixes[0]?.anchor).toEqual({ unitId: 'test-unit', declarationId: 'd1' });

    const ignored = analyzer.applyFix(u, diagnostic, 'MissingDestinationProperty:ignore-source');
    expect(ignored.declarations[0]?.ignoredSourceMembers).toEqual(['Titel']);
    expect(analyzer.applyFix(ignored, diagnostic, 'MissingDestinationProperty:ignore-source')).toEqual(ignored);
    expect((await analyzer.analyze(ignored)).diagnostics).toEqual([]);

    const mapped = analyzer.applyFix(u, diagnostic, 'MissingDestinationProperty:map-to-closest');
    expect((await analyzer.analyze(mapped)).diagnostics).toEqual([]);

    const noted = analyzer.applyFix(u, diagnostic, 'MissingDestinationProperty:comment');
    expect(noted.declarations[0]?.comments).toEqual([
      { text: 'Source.Titel has no destination member.' },
      { text: 'Add it to Destination or map it onto an existing member.' },
    ]);
  });

  it('offers no mapping when no destination member is close', async () => {
    const u = simpleUnit([member('Id', int), member('Checksum', str)], [member('Id', int)]);
    const fixes = analyzer.suggestFixes(u, await onlyDiagnostic(u));
    expect(fixes.map((f) => f.equivalenceKey)).toEqual([
      'MissingDestinationProperty:ignore-source',
      'MissingDestinationProperty:comment',
    ]);
  });
});

describe('recursion fixes', () => {
  const tree = unit(
    [
      shape('Node', member('Id', int), member('Parent', nullable(userType('Node')))),
      shape('NodeDto', member('Id', int), member('Parent', nullable(userType('NodeDto')))),
    ],
    [declaration('d1', 'Node', 'NodeDto')]
  );

  it('limits the mapping depth or ignores the recursive members', async () => {
    const diagnostic = await onlyDiagnostic(tree);
    const fixes = analyzer.suggestFixes(tree, diagnostic);

    expect(fixes.map((f) => [f.equivalenceKey, f.title, f.preview])).toEqual([
      ['InfiniteRecursion:max-depth', 'Limit mapping depth with MaxDepth(2)', 'MaxDepth(2)'],
      ['InfiniteRecursion:ignore', 'Ignore recursive member Parent', 'ForMember(dest => dest.Parent, opt => opt.Ignore())'],
    ]);

    const limited = analyzer.applyFix(tree, diagnostic, 'InfiniteRecursion:max-depth');
    expect(limited.declarations[0]?.maxDepth).toBe(2);
    expect(analyzer.applyFix(limited, diagnostic, 'InfiniteRecursion:max-depth')).toEqual(limited);
    expect((await analyzer.analyze(limited)).diagnostics).toEqual([]);

    const ignored = analyzer.applyFix(tree, diagnostic, 'InfiniteRecursion:ignore');
    expect(ignored.declarations[0]?.memberConfigs).toEqual([{ kind: 'ignore', destMember: 'Parent' }]);
    expect((await analyzer.analyze(ignored)).diagnostics).toEqual([]);
  });
});

describe('performance fixes', () => {
  const pricing = methodCall(captured('_pricing', 'IPricingService'), 'GetPrice', [accessor('src', 'Id')]);

  it('hoists an expensive call into a marked source member', async () => {
    const u = simpleUnit([member('Id', int)], [member('Id', int), member('Price', decimal)], [mapFrom('Price', pricing)]);
    const diagnostic = await onlyDiagnostic(u);
    expect(diagnostic.message).toBe(
      "Property 'Price' mapping contains external service call that should be performed before mapping to avoid performance issues"
    );

    const [hoist] = analyzer.suggestFixes(u, diagnostic);
    expect(hoist?.equivalenceKey).toBe('ExpensiveOperationInMapFrom:hoist');
    expect(hoist?.preview).toBe(
      'Remove configuration for Price; add decimal Price to Source (Populate before mapping)'
    );

    const fixed = analyzer.applyFix(u, diagnostic, 'ExpensiveOperationInMapFrom:hoist');
    expect(fixed.shapes[0]?.members).toEqual([
      member('Id', int),
      member('Price', decimal, { annotation: POPULATE_MARKER }),
    ]);
    expect(fixed.declarations[0]?.memberConfigs).toEqual([]);
    expect(analyzer.applyFix(fixed, diagnostic, 'ExpensiveOperationInMapFrom:hoist')).toEqual(fixed);
    expect((await analyzer.analyze(fixed)).diagnostics).toEqual([]);
  });

  it('reuses a source member of the same type', async () => {
    const now = memberAccess({ kind: 'type', name: 'DateTime' }, 'Now');
    const u = simpleUnit([member('Stamp', dateTime)], [member('Stamp', dateTime)], [mapFrom('Stamp', now)]);
    const diagnostic = await onlyDiagnostic(u);
    const [hoist] = analyzer.suggestFixes(u, diagnostic);

    expect(hoist?.equivalenceKey).toBe('NonDeterministicOperation:hoist');
    expect(hoist?.operations).toEqual([{ kind: 'remove-member-config', destMember: 'Stamp' }]);
    expect(hoist?.preview).toBe('Remove configuration for Stamp; map it from Source.Stamp');
  });

  it('offers no hoist when the source member has another type', async () => {
    const u = simpleUnit([member('Id', int), member('Price', str)], [member('Price', decimal)], [mapFrom('Price', pricing)]);
    const diagnostic = await onlyDiagnostic(u);
    expect(analyzer.suggestFixes(u, diagnostic)).toEqual([]);
  });

  it('materializes a collection enumerated twice', async () => {
    const expression: Expr = {
      kind: 'binary',
      operator: '/',
      left: methodCall(accessor('src', 'Items'), 'Sum'),
      right: methodCall(accessor('src', 'Items'), 'Count'),
    };
    const u = simpleUnit([member('Items', listOf(int))], [member('Average', decimal)], [mapFrom('Average', expression)]);
    const diagnostic = await onlyDiagnostic(u);
    const [materialize] = analyzer.suggestFixes(u, diagnostic);

    expect(materialize?.equivalenceKey).toBe('MultipleEnumeration:materialize');
    expect(materialize?.preview).toBe(
      'ForMember(dest => dest.Average, opt => opt.MapFrom(src => { var items = src.Items.ToList(); return items.Sum() / items.Count(); }))'
    );

    const fixed = analyzer.applyFix(u, diagnostic, 'MultipleEnumeration:materialize');
    expect((await analyzer.analyze(fixed)).diagnostics).toEqual([]);
  });

  it('picks a fresh local name', async () => {
    const expression: Expr = {
      kind: 'binary',
      operator: '+',
      left: {
        kind: 'binary',
        operator: '+',
        left: methodCall(accessor('src', 'Items'), 'Count'),
        right: methodCall(accessor('src', 'Items'), 'Sum'),
      },
      right: memberAccess(captured('items'), 'Length'),
    };
    const u = simpleUnit([member('Items', listOf(int))], [member('Total', int)], [mapFrom('Total', expression)]);
    const [materialize] = analyzer.suggestFixes(u, await onlyDiagnostic(u));

    expect(materialize?.preview).toBe(
      'ForMember(dest => dest.Total, opt => opt.MapFrom(src => { var items2 = src.Items.ToList(); return (items2.Count() + items2.Sum()) + items.Length; }))'
    );
  });
});

describe('duplicate declarations', () => {
  it('removes the later declaration', async () => {
    const u = unit(
      [shape('Source', member('Id', int)), shape('Destination', member('Id', int))],
      [declaration('d1', 'Source', 'Destination'), declaration('d2', 'Source', 'Destination')]
    );
    const diagnostic = await onlyDiagnostic(u);
    expect(diagnostic).toMatchObject({ ruleId: 'DuplicateMapping', declarationId: 'd2' });
    expect(diagnostic.message).toBe("Mapping from 'Source' to 'Destination' is declared more than once in this analysis unit");

    const fixed = analyzer.applyFix(u, diagnostic, 'DuplicateMapping:remove-declaration');
    expect(fixed.declarations.map((d) => d.id)).toEqual(['d1']);
    expect((await analyzer.analyze(fixed)).diagnostics).toEqual([]);

    const [edit] = analyzer.suggestFixes(u, diagnostic);
    if (!edit) throw new Error('expected a fix');
    expect(applyEdit(fixed, edit)).toEqual(fixed);
  });
});

describe('fix errors', () => {
  it('rejects a diagnostic from another unit', async () => {
    const u = simpleUnit([member('Age', int)], [member('Age', str)]);
    const diagnostic = await onlyDiagnostic(u);

    const err = captureError(() => analyzer.suggestFixes({ ...u, id: 'other-unit' }, diagnostic));
    expect(err).toBeInstanceOf(FixError);
    expect(err).toMatchObject({ code: 'EDIT_ANCHOR_NOT_FOUND' });
  });

  it('rejects an unknown equivalence key and lists the known ones', async () => {
    const u = simpleUnit([member('Age', int)], [member('Age', str)]);
    const diagnostic = await onlyDiagnostic(u);

    const err = captureError(() => analyzer.applyFix(u, diagnostic, 'PropertyTypeMismatch:parse'));
    expect(err).toBeInstanceOf(FixError);
    expect(err).toMatchObject({
      code: 'UNKNOWN_FIX',
      suggestion: 'Use one of: PropertyTypeMismatch:to-string, PropertyTypeMismatch:ignore',
    });
  });

  it('refuses to rewrite a member without an expression mapping', () => {
    const u = simpleUnit([member('Age', int)], [member('Age', str)], [{ kind: 'ignore', destMember: 'Age' }]);
    const err = captureError(() =>
      applyEdit(u, {
        title: 'Rewrite',
        equivalenceKey: 'test:rewrite',
        anchor: { unitId: 'test-unit', declarationId: 'd1', destMember: 'Age' },
        operations: [{ kind: 'rewrite-expression', destMember: 'Age', expression: literal('x') }],
      })
    );
    expect(err).toMatchObject({ code: 'FIX_NOT_APPLICABLE' });
  });

  it('reports a missing anchor declaration', () => {
    const u = simpleUnit([], []);
    const err = captureError(() =>
      applyEdit(u, {
        title: 'Ignore',
        equivalenceKey: 'test:ignore',
        anchor: { unitId: 'test-unit', declarationId: 'missing' },
        operations: [{ kind: 'append-member-config', config: { kind: 'ignore', destMember: 'Age' } }],
      })
    );
    expect(err).toMatchObject({ code: 'EDIT_ANCHOR_NOT_FOUND' });
  });
});
