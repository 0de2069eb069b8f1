// src/analyzer/report-aggregator.ts
/**
 * Merges checker output into a deterministic report: dedup by stable id,
 * sort by (principle, type, member), count. No other filtering.
 */

import { compareOrdinal } from './type-graph.js';
import { PRINCIPLES } from './types.js';
import type {
    CheckerRun,
    Finding,
    Principle,
    Report,
    ReportSummary,
    Severity,
} from './types.js';

export function compareFindings(a: Finding, b: Finding): number {
    return compareOrdinal(a.principle, b.principle)
        || compareOrdinal(a.typeName, b.typeName)
        || compareOrdinal(a.memberName ?? '', b.memberName ?? '');
}

export class ReportAggregator {
    /**
     * @param typesAnalyzed - size of the analyzed graph, echoed in the summary
     */
    aggregate(input: readonly CheckerRun[] | readonly Finding[], typesAnalyzed: number): Report {
        const findings = this.dedupe(flatten(input)).sort(compareFindings);
        return { findings, summary: this.summarize(findings, typesAnalyzed) };
    }

    /**
     * First occurrence of each id wins.
     */
    dedupe(findings: readonly Finding[]): Finding[] {
        const byId = new Map<string, Finding>();
        for (const finding of findings) {
            if (!byId.has(finding.id)) {
                byId.set(finding.id, finding);
            }
        }
        return [...byId.values()];
    }

    private summarize(findings: readonly Finding[], typesAnalyzed: number): ReportSummary {
        const byPrinciple: Record<Principle, number> = {
            SRP: 0,
            OCP: 0,
            LSP: 0,
            ISP: 0,
            DIP: 0,
        };
        const bySeverity: Record<Severity, number> = {
            low: 0,
            medium: 0,
            high: 0,
        };

        for (const finding of findings) {
            byPrinciple[finding.principle]++;
            bySeverity[finding.severity]++;
        }

        return { total: findings.length, typesAnalyzed, byPrinciple, bySeverity };
    }
}

function isCheckerRun(item: CheckerRun | Finding): item is CheckerRun {
    return 'findings' in item;
}

function flatten(input: readonly CheckerRun[] | readonly Finding[]): Finding[] {
    const flat: Finding[] = [];
    for (const item of input) {
        if (isCheckerRun(item)) {
            flat.push(...item.findings);
        } else {
            flat.push(item);
        }
    }
    return flat;
}

// =============================================================================
// Renderers
// =============================================================================

function formatSubject(finding: Finding): string {
    return finding.memberName === undefined ? finding.typeName : `${finding.typeName}.${finding.memberName}`;
}

/**
 * One line per finding, then a summary line. Output depends only on the report.
 */
export function renderText(report: Report): string {
    const { findings, summary } = report;
    const typeLabel = `${summary.typesAnalyzed} type${summary.typesAnalyzed === 1 ? '' : 's'}`;

    if (findings.length === 0) {
        return `No design-principle violations found in ${typeLabel}.\n`;
    }

    const lines = findings.map(f =>
        `${f.severity.toUpperCase().padEnd(8)} ${f.principle} ${formatSubject(f)} ${f.message}`
    );
    const counts = PRINCIPLES
        .filter(p => summary.byPrinciple[p] > 0)
        .map(p => `${p}: ${summary.byPrinciple[p]}`)
        .join(', ');

    lines.push('');
    lines.push(`${summary.total} finding${summary.total === 1 ? '' : 's'} in ${typeLabel} (${counts})`);
    return `${lines.join('\n')}\n`;
}

export function renderJson(report: Report): string {
    return `${JSON.stringify(report, null, 2)}\n`;
}
