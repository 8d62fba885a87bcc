import { MASKED_VALUE, OutputState, formatOutputValue } from '@stackplan/core';
import { ChangeOutcome, ChangeStatus, ExecutionReport } from '../executor/executor';

const STATUS_ORDER: ChangeStatus[] = ['succeeded', 'failed', 'skipped', 'cancelled', 'rolledBack'];

export type ReportSummary = Record<ChangeStatus, number>;

export function summarizeReport(report: ExecutionReport): ReportSummary {
    const summary: ReportSummary = { succeeded: 0, failed: 0, skipped: 0, cancelled: 0, rolledBack: 0 };
    for (const outcome of report.outcomes) {
        summary[outcome.status]++;
    }
    return summary;
}

/**
 * Per-resource outcome lines followed by a summary.
 */
export function renderReport(report: ExecutionReport): string[] {
    const lines = report.outcomes.map((outcome) => renderOutcome(outcome));
    const summary = summarizeReport(report);
    const counts = STATUS_ORDER.filter((status) => summary[status] > 0).map((status) => `${summary[status]} ${status}`);
    lines.push(
        `Stack ${report.stackName}: ${report.status} in ${report.durationMs}ms` +
            (counts.length > 0 ? ` (${counts.join(', ')})` : ''),
    );
    return lines;
}

export function renderOutputs(outputs: { [name: string]: OutputState }): string[] {
    return Object.entries(outputs).map(
        ([name, output]) => `${name} = ${output.noEcho ? MASKED_VALUE : formatOutputValue(output.value)}`,
    );
}

function renderOutcome(outcome: ChangeOutcome): string {
    let line = `  ${outcome.status.padEnd(10)} ${outcome.action} ${outcome.logicalId}`;
    if (outcome.physicalId) {
        line += ` [${outcome.physicalId}]`;
    }
    if (outcome.attempts > 1) {
        line += ` after ${outcome.attempts} attempts`;
    }
    if (outcome.error) {
        line += `: ${outcome.error}`;
    }
    if (outcome.rollbackError) {
        line += ` (rollback failed: ${outcome.rollbackError})`;
    }
    return line;
}
