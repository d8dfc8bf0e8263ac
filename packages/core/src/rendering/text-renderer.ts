import type { AnswerReport, ClaimOutcome } from '@epirisk/shared/src/types/analysis.types.js';

const BAR_WIDTH = 20;
const MAX_CLAIM_LENGTH = 60;
const MAX_EVIDENCE_LENGTH = 60;
const MAX_EVIDENCE_SHOWN = 3;

const LABELS = ['GROUNDED', 'WEAK', 'HALLUCINATED', 'UNVERIFIABLE'] as const;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

function percent(value: number): string {
  return `${String(Math.round(value * 100))}%`;
}

export function riskBar(risk: number, width: number = BAR_WIDTH): string {
  const filled = Math.floor(risk * width);
  return `${'█'.repeat(filled)}${'░'.repeat(width - filled)} ${percent(risk)}`;
}

function renderOutcome(outcome: ClaimOutcome): string[] {
  const title = `"${truncate(outcome.claim.text, MAX_CLAIM_LENGTH)}"`;

  if (outcome.kind === 'unverifiable') {
    return [`[UNVERIFIABLE] ${title}`, `  Reason: ${outcome.reason} (${outcome.code})`];
  }

  const { verdict } = outcome;
  const lines = [
    `[${verdict.label}] ${title}`,
    `  Risk: ${riskBar(verdict.riskScore)}`,
    `  Confidence: ${verdict.calibration.rawConfidence.toFixed(2)} (raw) -> ${verdict.calibration.calibratedConfidence.toFixed(2)} (calibrated)`,
    `  Evidence strength: ${verdict.alignment.evidenceStrength.toFixed(2)}`,
  ];

  const evidence = verdict.alignment.labeledEvidence.slice(0, MAX_EVIDENCE_SHOWN);
  if (evidence.length === 0) {
    lines.push('  Evidence: none');
  } else {
    lines.push('  Evidence:');
    for (const chunk of evidence) {
      lines.push(`    [${chunk.relation}] ${truncate(chunk.text, MAX_EVIDENCE_LENGTH)}`);
    }
  }

  lines.push(`  Why: ${verdict.explanation}`);
  return lines;
}

/** Plain-text report for terminals. */
export function renderText(report: AnswerReport): string {
  const total = report.outcomes.length;
  const lines = [
    '═══ EPISTEMIC RISK ANALYSIS ═══',
    '',
    `Claims analyzed: ${String(total)}`,
    `Overall risk: ${report.overallRisk === null ? 'n/a' : riskBar(report.overallRisk)}`,
    '',
  ];

  for (const label of LABELS) {
    const count = report.counts[label];
    const share = total === 0 ? 0 : count / total;
    lines.push(`${label.padEnd(14)}${String(count).padStart(3)}  ${percent(share).padStart(4)}`);
  }

  for (const outcome of report.outcomes) {
    lines.push('', ...renderOutcome(outcome));
  }

  for (const warning of report.warnings) {
    lines.push('', `Warning: ${warning}`);
  }

  lines.push('', `Summary: ${report.summary}`);
  return lines.join('\n');
}
