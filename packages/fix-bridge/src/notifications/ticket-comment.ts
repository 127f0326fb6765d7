/**
 * Ticket comment rendering
 *
 * Turns a terminal run into an Atlassian Document Format (ADF) comment body,
 * and into a plain-text line for the logging notifier.
 */

import { Run, RunStatus } from '../runs/run.types';

export interface AdfMark {
  type: 'strong' | 'link' | 'code';
  attrs?: { href: string };
}

export interface AdfText {
  type: 'text';
  text: string;
  marks?: AdfMark[];
}

export interface AdfParagraph {
  type: 'paragraph';
  content: AdfText[];
}

export interface AdfDocument {
  type: 'doc';
  version: 1;
  content: AdfParagraph[];
}

const text = (value: string, ...marks: AdfMark[]): AdfText =>
  marks.length > 0 ? { type: 'text', text: value, marks } : { type: 'text', text: value };

const paragraph = (...content: AdfText[]): AdfParagraph => ({ type: 'paragraph', content });

const strong: AdfMark = { type: 'strong' };

function completedParagraphs(run: Run): AdfParagraph[] {
  const result = run.result ?? {};
  const paragraphs: AdfParagraph[] = [];

  if (result.prUrl) {
    paragraphs.push(
      paragraph(
        text('Pull Request created: ', strong),
        text(result.prUrl, { type: 'link', attrs: { href: result.prUrl } }),
      ),
    );
  } else {
    paragraphs.push(paragraph(text('Automated fix completed without a pull request.', strong)));
  }

  const details: string[] = [];
  if (result.prNumber !== undefined) details.push(`PR #${result.prNumber}`);
  if (result.branchName) details.push(`branch ${result.branchName}`);
  if (result.commitSha) details.push(`commit ${result.commitSha.slice(0, 12)}`);
  if (details.length > 0) {
    paragraphs.push(paragraph(text(details.join(', '))));
  }

  if (result.filesChanged && result.filesChanged.length > 0) {
    paragraphs.push(paragraph(text(`Files changed: ${result.filesChanged.join(', ')}`)));
  }

  if (result.analysis) {
    paragraphs.push(paragraph(text(result.analysis)));
  }

  return paragraphs;
}

export function buildRunComment(run: Run): AdfDocument {
  let content: AdfParagraph[];

  switch (run.status) {
    case RunStatus.COMPLETED:
      content = completedParagraphs(run);
      break;
    case RunStatus.FAILED:
      content = [
        paragraph(
          text('Automated fix failed: ', strong),
          text(run.error?.message ?? 'no reason reported'),
        ),
      ];
      break;
    case RunStatus.CANCELLED:
      content = [
        paragraph(
          text('Automated fix cancelled', strong),
          ...(run.cancelReason ? [text(`: ${run.cancelReason}`)] : []),
        ),
      ];
      break;
    default:
      throw new Error(`Run ${run.runId} is not terminal (${run.status})`);
  }

  content.push(paragraph(text(`Run ${run.runId}`, { type: 'code' })));

  return { type: 'doc', version: 1, content };
}

export function summarizeRun(run: Run): string {
  switch (run.status) {
    case RunStatus.COMPLETED:
      return run.result?.prUrl
        ? `fix ready: ${run.result.prUrl}`
        : 'fix completed without a pull request';
    case RunStatus.FAILED:
      return `fix failed: ${run.error?.message ?? 'no reason reported'}`;
    case RunStatus.CANCELLED:
      return run.cancelReason ? `fix cancelled: ${run.cancelReason}` : 'fix cancelled';
    default:
      return `run is ${run.status}`;
  }
}
