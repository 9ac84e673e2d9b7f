import type { OriginalityReportPayload, SimilarityMatchPayload } from '@originality/shared';

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

function percent(score: number): string {
  return `${(score * 100).toFixed(1)}%`;
}

function describeTarget(match: SimilarityMatchPayload): string {
  return match.target.type === 'sibling'
    ? match.target.file_name
    : `submission ${match.target.submission_id} (author ${match.target.author_id})`;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line, i) => (i === 0 ? `- ${line}` : `  ${line}`))
    .join('\n');
}

export function renderReportMarkdown(report: OriginalityReportPayload): string {
  const lines: string[] = [
    '# Originality Report',
    '',
    `**Report ID**: ${report.report_id}`,
    `**Submission ID**: ${report.submission_id}`,
    `**Author ID**: ${report.author_id}`,
    `**Generated**: ${report.generated_at}`,
    '',
    '## Summary',
    '',
    `- **Originality score**: ${report.originality_score.toFixed(2)} / 100`,
    `- **Risk level**: ${report.risk_level.toUpperCase()}`,
    `- **Duplication score**: ${report.duplication_score.toFixed(2)}`,
    `- **Authorship score**: ${report.authorship_score === null ? 'not available' : report.authorship_score.toFixed(2)}`,
    '',
    '## Coverage',
    '',
    `- Internal comparison: ${yesNo(report.internal_comparison_checked)}`,
    `- Cross-submission search: ${yesNo(report.cross_submission_checked)}`,
    `- Authorship classification: ${yesNo(report.authorship_checked)}`,
    `- Elaborated recommendations: ${yesNo(report.recommendations_elaborated)}`,
  ];

  if (report.unanalyzable_units.length > 0) {
    lines.push('', '### Skipped files', '');
    for (const unit of report.unanalyzable_units) {
      lines.push(`- ${unit.file_name}: ${unit.reason}`);
    }
  }

  lines.push('', '## Matches', '');
  if (report.matches.length === 0) {
    lines.push('No significant similarities detected.');
  }
  report.matches.forEach((match, i) => {
    lines.push(
      `${i + 1}. **${match.source.file_name}** vs **${describeTarget(match)}**: ${percent(match.score)} ${match.kind}${match.flagged ? ' (flagged)' : ''}, ${match.spans.length} matched span(s)`,
    );
  });

  lines.push('', '## Authorship', '');
  if (report.verdicts.length === 0) {
    lines.push('No verdicts.');
  }
  for (const verdict of report.verdicts) {
    const flags = [verdict.source, verdict.degraded_confidence ? 'degraded' : null, verdict.fallback_reason]
      .filter((flag): flag is string => flag !== null)
      .join(', ');
    lines.push(`- **${verdict.unit.file_name}**: ${verdict.category} (confidence ${verdict.confidence}; ${flags})`);
    for (const entry of verdict.rationale) {
      lines.push(`  - ${entry.dimension} ${entry.dimension_score}: ${entry.evidence}`);
    }
  }

  lines.push('', '## Recommendations', '');
  for (const recommendation of report.recommendations) {
    lines.push(indent(recommendation));
  }

  if (report.notes.length > 0) {
    lines.push('', '## Notes', '');
    for (const note of report.notes) {
      lines.push(`- ${note}`);
    }
  }

  return `${lines.join('\n')}\n`;
}
