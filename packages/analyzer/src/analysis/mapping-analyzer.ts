/**
 * Mapping Analyzer
 *
 * Runs one analysis pass over a unit in two phases: the mapping registry is
 * built from every declaration first, then each declaration is classified,
 * checked for recursive member graphs and scanned for hazards. The pass yields to the event loop between
 * declarations so an abort signal can interrupt it.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  AnalysisError,
  type AnalysisUnit,
  type Diagnostic,
  type Edit,
  type MappingDeclaration,
  type RuleId,
  type Severity,
  type TypeShape,
  wrapError,
} from '@mapcheck/core';
import {
  CompatibilityClassifier,
  buildOverrideMap,
  detectRecursion,
  indexShapes,
  type OverrideMap,
  type ShapeIndex,
} from '../classification/index.js';
import { FixError } from '../errors/index.js';
import { FixSynthesizer, applyEdit } from '../fixes/index.js';
import { HazardDetector } from '../hazards/index.js';
import { noopLogger, type AnalysisLogger, type AnalyzeOptions, type IMappingAnalyzer } from '../interfaces/index.js';
import { MappingRegistry } from '../registry/index.js';
import { PERFORMANCE_RULES, buildDiagnostic, ruleOrder } from '../rules/index.js';
import {
  resolveAnalyzerOptions,
  type AnalysisFailure,
  type AnalysisReport,
  type AnalysisSummary,
  type AnalyzerOptions,
  type ResolvedAnalyzerOptions,
} from '../types/index.js';

function throwIfAborted(signal: AbortSignal | undefined, unitId: string): void {
  if (signal?.aborted) {
    throw new AnalysisError({
      code: 'ANALYSIS_CANCELLED',
      message: `Analysis of unit '${unitId}' was cancelled`,
      unitId,
    });
  }
}

export class MappingAnalyzer implements IMappingAnalyzer {
  readonly options: ResolvedAnalyzerOptions;
  private readonly hazards: HazardDetector;
  private readonly fixes: FixSynthesizer;

  constructor(
    options: AnalyzerOptions = {},
    private readonly logger: AnalysisLogger = noopLogger
  ) {
    this.options = resolveAnalyzerOptions(options);
    this.hazards = new HazardDetector(this.options.dependencyPatterns);
    this.fixes = new FixSynthesizer({ fuzzyMatch: this.options.fuzzyMatch });
  }

  async analyze(unit: AnalysisUnit, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
    const startTime = Date.now();
    const { signal } = options;
    throwIfAborted(signal, unit.id);

    // Phase 1: every edge must exist before any nested-type check
    const registry = new MappingRegistry(unit);
    const shapes = indexShapes(unit);
    const classifier = new CompatibilityClassifier(registry, this.logger);

    const diagnostics: Diagnostic[] = [];
    const failures: AnalysisFailure[] = [];

    for (const { declaration } of registry.findDuplicates()) {
      diagnostics.push(buildDiagnostic('DuplicateMapping', unit.id, declaration));
    }

    // Phase 2
    for (const declaration of unit.declarations) {
      await yieldToEventLoop();
      throwIfAborted(signal, unit.id);

      const source = shapes.get(declaration.sourceType);
      const dest = shapes.get(declaration.destType);
      if (!source || !dest) {
        const missing = !source ? declaration.sourceType : declaration.destType;
        this.logger.warn('Declaration references an unknown shape', {
          unitId: unit.id,
          declarationId: declaration.id,
          shape: missing,
        });
        failures.push({
          declarationId: declaration.id,
          code: 'UNKNOWN_SHAPE',
          message: `Shape '${missing}' is not defined in unit '${unit.id}'`,
        });
        continue;
      }

      const overrides = buildOverrideMap(declaration);
      const result = classifier.classifyDeclaration(declaration, source, dest, overrides);
      diagnostics.push(...result.diagnostics);
      failures.push(...result.failures);

      if (!declaration.customConversion) {
        const recursion = detectRecursion(declaration, source, dest, shapes, overrides);
        if (recursion) {
          diagnostics.push(
            buildDiagnostic('InfiniteRecursion', unit.id, declaration, {
              properties: { reason: recursion.reason, members: recursion.members.join(', ') },
            })
          );
        }
      }

      if (this.options.performanceWarnings && !declaration.customConversion) {
        this.detectHazards(unit.id, declaration, source, overrides, shapes, diagnostics, failures);
      }
    }

    throwIfAborted(signal, unit.id);

    const reported = this.applySeverityPolicy(diagnostics);
    const sorted = this.sortDiagnostics(unit, reported);
    const processingTimeMs = Date.now() - startTime;

    this.logger.debug('Analysis complete', {
      unitId: unit.id,
      declarations: unit.declarations.length,
      edges: registry.edgeCount,
      diagnostics: sorted.length,
      failures: failures.length,
      processingTimeMs,
    });

    return {
      unitId: unit.id,
      diagnostics: sorted,
      failures,
      summary: this.summarize(unit, sorted, failures),
      timestamp: new Date(),
      processingTimeMs,
    };
  }

  suggestFixes(unit: AnalysisUnit, diagnostic: Diagnostic): Edit[] {
    return this.fixes.synthesize(diagnostic, unit);
  }

  applyFix(unit: AnalysisUnit, diagnostic: Diagnostic, equivalenceKey: string): AnalysisUnit {
    const edits = this.suggestFixes(unit, diagnostic);
    const edit = edits.find((e) => e.equivalenceKey === equivalenceKey);
    if (!edit) {
      const available = edits.map((e) => e.equivalenceKey);
      throw new FixError({
        code: 'UNKNOWN_FIX',
        message: `No fix '${equivalenceKey}' for ${diagnostic.ruleId} on '${diagnostic.member ?? diagnostic.declarationId}'`,
        suggestion: available.length
          ? `Use one of: ${available.join(', ')}`
          : 'This diagnostic has no automatic fix',
        context: { available },
      });
    }
    return applyEdit(unit, edit);
  }

  private detectHazards(
    unitId: string,
    declaration: MappingDeclaration,
    source: TypeShape,
    overrides: OverrideMap,
    shapes: ShapeIndex,
    diagnostics: Diagnostic[],
    failures: AnalysisFailure[]
  ): void {
    for (const [member, config] of overrides) {
      if (config.kind !== 'map-from') continue;
      try {
        for (const hazard of this.hazards.detect(config, source, shapes)) {
          diagnostics.push(
            buildDiagnostic(hazard.ruleId, unitId, declaration, { member, properties: hazard.properties })
          );
        }
      } catch (err) {
        const failure = wrapError(err, unitId, 'MEMBER_CLASSIFICATION_FAILED');
        this.logger.warn('Hazard detection failed', {
          unitId,
          declarationId: declaration.id,
          member,
          error: failure.message,
        });
        failures.push({
          declarationId: declaration.id,
          member,
          code: failure.code,
          message: failure.message,
        });
      }
    }
  }

  /**
   * Effective severity for a rule, or undefined when the rule is switched off
   */
  severityFor(ruleId: RuleId, defaultSeverity: Severity): Severity | undefined {
    if (PERFORMANCE_RULES.has(ruleId) && !this.options.performanceWarnings) return undefined;
    if (ruleId === 'NullableCompatibility' && !this.options.nullableWarnings) return undefined;

    const override = this.options.rules[ruleId];
    if (override === 'off') return undefined;
    if (override) return override;

    if (ruleId === 'NonDeterministicOperation' && this.options.nonDeterministicSeverity) {
      return this.options.nonDeterministicSeverity;
    }
    return defaultSeverity;
  }

  private applySeverityPolicy(diagnostics: Diagnostic[]): Diagnostic[] {
    const reported: Diagnostic[] = [];
    for (const diagnostic of diagnostics) {
      const severity = this.severityFor(diagnostic.ruleId, diagnostic.severity);
      if (severity) reported.push({ ...diagnostic, severity });
    }
    return reported;
  }

  private sortDiagnostics(unit: AnalysisUnit, diagnostics: Diagnostic[]): Diagnostic[] {
    const declarationIndex = new Map(unit.declarations.map((d, i) => [d.id, i]));
    const memberIndex = new Map<string, number>();
    for (const declaration of unit.declarations) {
      const dest = unit.shapes.find((s) => s.name === declaration.destType);
      dest?.members.forEach((m, i) => memberIndex.set(`${declaration.id}\u0000${m.name}`, i));
    }

    const position = (d: Diagnostic): number =>
      d.member === undefined ? -1 : (memberIndex.get(`${d.declarationId}\u0000${d.member}`) ?? Number.MAX_SAFE_INTEGER);

    return [...diagnostics].sort(
      (a, b) =>
        (declarationIndex.get(a.declarationId) ?? 0) - (declarationIndex.get(b.declarationId) ?? 0) ||
        position(a) - position(b) ||
        ruleOrder(a.ruleId) - ruleOrder(b.ruleId)
    );
  }

  private summarize(unit: AnalysisUnit, diagnostics: Diagnostic[], failures: AnalysisFailure[]): AnalysisSummary {
    const bySeverity: Record<Severity, number> = { error: 0, warning: 0, info: 0, hidden: 0 };
    const byRule: Partial<Record<RuleId, number>> = {};
    for (const diagnostic of diagnostics) {
      bySeverity[diagnostic.severity]++;
      byRule[diagnostic.ruleId] = (byRule[diagnostic.ruleId] ?? 0) + 1;
    }
    return {
      declarationCount: unit.declarations.length,
      diagnosticCount: diagnostics.length,
      bySeverity,
      byRule,
      failureCount: failures.length,
    };
  }
}
