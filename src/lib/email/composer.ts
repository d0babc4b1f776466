/**
 * Notification Composer
 *
 * Renders the reminder mail (subject, one HTML row per candidate, body) from
 * the configured templates. All three templates are compiled when the
 * composer is constructed; a missing required placeholder raises a
 * TemplateError before any mail is rendered or sent.
 */

import { formatDate } from '@/lib/dates/date-resolver';
import type { DocumentRecord } from '@/lib/documents/types';
import { emailLogger, type Logger } from '@/lib/logger';
import { compileTemplate, type CompiledTemplate } from './renderer';
import { TEST_MESSAGE_TEMPLATE } from './templates';
import type { ComposedMessage, ReminderTemplates } from './types';

// =============================================================================
// Display helpers
// =============================================================================

export const DISPLAY_COLORS = {
  gray: '#666666',
  red: '#dc3545',
  orange: '#fd7e14',
  yellow: '#ffc107',
  green: '#28a745',
} as const;

/**
 * Text color of the days-left cell
 */
export function displayColor(daysLeft: number | null): string {
  if (daysLeft === null) return DISPLAY_COLORS.gray;
  if (daysLeft <= 1) return DISPLAY_COLORS.red;
  if (daysLeft <= 7) return DISPLAY_COLORS.orange;
  if (daysLeft <= 30) return DISPLAY_COLORS.yellow;
  return DISPLAY_COLORS.green;
}

export function formatDaysLeft(daysLeft: number | null): string {
  if (daysLeft === null) return '未知';
  if (daysLeft < 0) return `已过期 ${Math.abs(daysLeft)} 天`;
  if (daysLeft === 0) return '今天到期';
  if (daysLeft === 1) return '明天到期';
  return `${daysLeft} 天后到期`;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

// =============================================================================
// Placeholder formatters
// =============================================================================

interface SubjectInput {
  count: number;
  todayDate: string;
}

interface BodyInput {
  tableRows: string;
}

interface TestMessageInput {
  sendTime: string;
}

const SUBJECT_FORMATTERS = {
  count: (input: SubjectInput) => String(input.count),
  today_date: (input: SubjectInput) => input.todayDate,
};

const BODY_FORMATTERS = {
  table_rows: (input: BodyInput) => input.tableRows,
};

const ROW_FORMATTERS = {
  person_name: (doc: DocumentRecord) => escapeHtml(doc.personName),
  document_type: (doc: DocumentRecord) => escapeHtml(doc.documentType),
  expiry_date: (doc: DocumentRecord) => (doc.expiryDate ? formatDate(doc.expiryDate) : '未知'),
  days_left: (doc: DocumentRecord) => formatDaysLeft(doc.daysLeft),
  remarks: (doc: DocumentRecord) => escapeHtml(doc.remarks),
  color: (doc: DocumentRecord) => displayColor(doc.daysLeft),
};

const TEST_MESSAGE_FORMATTERS = {
  send_time: (input: TestMessageInput) => input.sendTime,
};

// =============================================================================
// Composer
// =============================================================================

export interface NotificationComposerOptions {
  logger?: Logger;
}

export class NotificationComposer {
  private readonly subject: CompiledTemplate<SubjectInput>;
  private readonly body: CompiledTemplate<BodyInput>;
  private readonly row: CompiledTemplate<DocumentRecord>;
  private readonly logger: Logger;

  constructor(templates: ReminderTemplates, options: NotificationComposerOptions = {}) {
    this.subject = compileTemplate('subject', templates.subject, SUBJECT_FORMATTERS);
    this.body = compileTemplate('body', templates.bodyHtml, BODY_FORMATTERS);
    this.row = compileTemplate('row', templates.tableRowHtml, ROW_FORMATTERS);
    this.logger = options.logger ?? emailLogger.child({ component: 'composer' });
  }

  renderSubject(count: number, today: Date): string {
    return this.subject.render({ count, todayDate: formatDate(today) });
  }

  renderRow(doc: DocumentRecord): string {
    return this.row.render(doc);
  }

  /**
   * Rows in the order received, joined by newlines, inside the body template
   */
  renderBody(documents: readonly DocumentRecord[]): string {
    const tableRows = documents.map((doc) => this.renderRow(doc)).join('\n');
    return this.body.render({ tableRows });
  }

  compose(documents: readonly DocumentRecord[], today: Date): ComposedMessage {
    const message = {
      subject: this.renderSubject(documents.length, today),
      html: this.renderBody(documents),
    };

    this.logger.debug(
      { subject: message.subject, rows: documents.length },
      'Reminder message composed'
    );

    return message;
  }
}

/**
 * Mail used to check the relay configuration end to end
 */
export function composeTestMessage(subject: string, sentAt: Date): ComposedMessage {
  const template = compileTemplate('test-message', TEST_MESSAGE_TEMPLATE, TEST_MESSAGE_FORMATTERS);
  return {
    subject,
    html: template.render({ sendTime: formatDate(sentAt, 'yyyy-MM-dd HH:mm:ss') }),
  };
}
