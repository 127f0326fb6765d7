import { JiraWebhookDto } from './dto/jira-webhook.dto';

export const TRIGGER_EVENTS = ['jira:issue_created', 'jira:issue_updated'];

export type JiraTriggerDecision =
  | { accepted: true; issueKey: string; summary: string; description: string }
  | { accepted: false; reason: string };

/**
 * Flatten a description to text. Jira Cloud v3 sends Atlassian Document
 * Format; older payloads send a string.
 */
export function descriptionText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  const blocks: string[] = [];
  const walk = (node: unknown, line: string[]): void => {
    if (typeof node !== 'object' || node === null) {
      return;
    }
    const type: unknown = Reflect.get(node, 'type');
    const text: unknown = Reflect.get(node, 'text');
    const content: unknown = Reflect.get(node, 'content');

    if (type === 'text' && typeof text === 'string') {
      line.push(text);
      return;
    }
    if (type === 'hardBreak') {
      line.push('\n');
      return;
    }
    if (!Array.isArray(content)) {
      return;
    }
    if (type === 'paragraph' || type === 'heading' || type === 'codeBlock') {
      const own: string[] = [];
      content.forEach((child) => walk(child, own));
      blocks.push(own.join(''));
      return;
    }
    content.forEach((child) => walk(child, line));
  };

  walk(value, []);
  return blocks.filter((block) => block.trim() !== '').join('\n\n');
}

export function evaluateJiraWebhook(
  payload: JiraWebhookDto,
  triggerLabel: string,
): JiraTriggerDecision {
  const event = payload.webhookEvent;
  if (!event || !TRIGGER_EVENTS.includes(event)) {
    return { accepted: false, reason: `event ${event ?? '(none)'} is not an issue create/update` };
  }

  const issueKey = payload.issue?.key;
  if (!issueKey) {
    return { accepted: false, reason: 'payload carries no issue key' };
  }

  const fields = payload.issue?.fields;
  if (!(fields?.labels ?? []).includes(triggerLabel)) {
    return { accepted: false, reason: `${triggerLabel} label not present` };
  }

  return {
    accepted: true,
    issueKey,
    summary: fields?.summary || 'No summary',
    description: descriptionText(fields?.description) || 'No description provided',
  };
}
