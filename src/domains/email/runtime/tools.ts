/**
 * Email engine tools.
 *
 * Each tool validates its input, calls one engine operation and returns a
 * JSON-serializable result. Message bodies are never returned.
 */

import type { Result } from '../../../utils/errors.js';
import type { ToolDefinition } from '../../../tools/types.js';
import {
  failureResult,
  oneOf,
  positiveInteger,
  readBoolean,
  readEnum,
  readNumber,
  readString,
  readStringArray,
  stringArray,
  validateInput,
} from '../../../tools/utils.js';
import { searchAttachments } from '../service/attachment-search.js';
import { toEmailSummary } from '../service/format.js';
import { categorizeEmails, getPriorityInbox } from '../service/inbox.js';
import { searchEmails } from '../service/search.js';
import { getConversationHistory } from '../service/threads.js';
import {
  EMAIL_CATEGORIES,
  PRIORITY_LEVELS,
  UPDATABLE_FIELDS,
  type EmailRecordUpdate,
  type EngineContext,
} from '../types.js';

const DATE_DESCRIPTION = 'YYYY-MM-DD, or relative: "today", "yesterday", "last week", "last month", "past 7 days", "3 days ago"';

/**
 * Validate a partial update. Only the updatable fields are accepted, each
 * with its own type.
 */
export function parseEmailUpdate(value: unknown): Result<EmailRecordUpdate> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return { success: false, error: 'updates must be an object.' };
  }

  const update: EmailRecordUpdate = {};
  for (const [field, fieldValue] of Object.entries(value)) {
    switch (field) {
      case 'isRead':
      case 'isStarred':
      case 'isImportant':
        if (typeof fieldValue !== 'boolean') {
          return { success: false, error: `${field} must be a boolean.` };
        }
        update[field] = fieldValue;
        break;
      case 'labels':
        if (!Array.isArray(fieldValue) || !fieldValue.every((label) => typeof label === 'string')) {
          return { success: false, error: 'labels must be an array of strings.' };
        }
        update.labels = fieldValue.filter((label): label is string => typeof label === 'string');
        break;
      case 'category': {
        const category = EMAIL_CATEGORIES.find((option) => option === fieldValue);
        if (fieldValue !== null && !category) {
          return { success: false, error: `category must be one of: ${EMAIL_CATEGORIES.join(', ')}.` };
        }
        update.category = category ?? null;
        break;
      }
      case 'priority': {
        const priority = PRIORITY_LEVELS.find((option) => option === fieldValue);
        if (fieldValue !== null && !priority) {
          return { success: false, error: `priority must be one of: ${PRIORITY_LEVELS.join(', ')}.` };
        }
        update.priority = priority ?? null;
        break;
      }
      default:
        return {
          success: false,
          error: `Field "${field}" cannot be updated. Allowed: ${UPDATABLE_FIELDS.join(', ')}.`,
        };
    }
  }

  if (Object.keys(update).length === 0) {
    return { success: false, error: 'updates must contain at least one field.' };
  }
  return { success: true, data: update };
}

/**
 * Build the tool definitions bound to one engine.
 */
export function createEmailTools(engine: EngineContext): ToolDefinition[] {
  const searchEmailsTool: ToolDefinition = {
    tool: {
      name: 'search_emails',
      description: 'Search emails by keywords, sender, recipient, category, date range, labels or read state. Results are newest first.',
      input_schema: {
        type: 'object' as const,
        properties: {
          search_text: { type: 'string', description: 'Keywords to search in subject and body (typo tolerant)' },
          sender: { type: 'string', description: 'Sender address or name fragment' },
          recipient: { type: 'string', description: 'Recipient or cc address fragment' },
          category: { type: 'string', enum: [...EMAIL_CATEGORIES], description: 'Assigned category' },
          date_from: { type: 'string', description: `Start date (${DATE_DESCRIPTION})` },
          date_to: { type: 'string', description: `End date (${DATE_DESCRIPTION})` },
          has_attachments: { type: 'boolean', description: 'Only emails with (true) or without (false) attachments' },
          labels: { type: 'array', items: { type: 'string' }, description: 'Labels the email must all carry, e.g. ["IMPORTANT"]' },
          is_read: { type: 'boolean', description: 'Filter by read state' },
          max_results: { type: 'number', description: 'Maximum results (default 10, max 500)' },
        },
      },
    },
    handler: async (input) => {
      const validationError = validateInput(input, {
        search_text: { type: 'string', required: false },
        sender: { type: 'string', required: false },
        recipient: { type: 'string', required: false },
        category: { type: 'string', required: false, validate: oneOf(EMAIL_CATEGORIES, 'category') },
        date_from: { type: 'string', required: false },
        date_to: { type: 'string', required: false },
        has_attachments: { type: 'boolean', required: false },
        labels: { type: 'array', required: false, validate: stringArray('labels') },
        is_read: { type: 'boolean', required: false },
        max_results: { type: 'number', required: false, validate: positiveInteger('max_results') },
      });
      if (validationError) return validationError;

      try {
        const records = await searchEmails(engine, {
          searchText: readString(input, 'search_text'),
          sender: readString(input, 'sender'),
          recipient: readString(input, 'recipient'),
          category: readEnum(input, 'category', EMAIL_CATEGORIES),
          dateFrom: readString(input, 'date_from'),
          dateTo: readString(input, 'date_to'),
          hasAttachments: readBoolean(input, 'has_attachments'),
          labels: readStringArray(input, 'labels'),
          isRead: readBoolean(input, 'is_read'),
          maxResults: readNumber(input, 'max_results'),
        });
        return {
          success: true,
          totalResults: records.length,
          emails: records.map(toEmailSummary),
        };
      } catch (error) {
        return failureResult(error, 'Search failed');
      }
    },
  };

  const conversationHistoryTool: ToolDefinition = {
    tool: {
      name: 'get_conversation_history',
      description: 'Get all emails exchanged with a person or company (sent by them or addressed to them), grouped into conversations, oldest first.',
      input_schema: {
        type: 'object' as const,
        properties: {
          contact: { type: 'string', description: 'Email address or address fragment, e.g. "jane@acme.com" or "acme.com"' },
          thread_id: { type: 'string', description: 'Restrict to one conversation' },
          max_results: { type: 'number', description: 'Maximum emails (default 100)' },
        },
        required: ['contact'],
      },
    },
    handler: async (input) => {
      const validationError = validateInput(input, {
        contact: { type: 'string', required: true },
        thread_id: { type: 'string', required: false },
        max_results: { type: 'number', required: false, validate: positiveInteger('max_results') },
      });
      if (validationError) return validationError;

      try {
        const history = await getConversationHistory(engine, {
          contact: readString(input, 'contact') ?? '',
          threadId: readString(input, 'thread_id'),
          maxResults: readNumber(input, 'max_results'),
        });
        return { success: true, ...history };
      } catch (error) {
        return failureResult(error, 'Failed to get conversation history');
      }
    },
  };

  const searchAttachmentsTool: ToolDefinition = {
    tool: {
      name: 'search_attachments',
      description: 'Search inside email attachments (PDFs, documents, spreadsheets). Logos, signatures and inline images are ignored.',
      input_schema: {
        type: 'object' as const,
        properties: {
          search_text: { type: 'string', description: 'Phrase to find, e.g. "net 30" or "invoice"' },
          file_type: { type: 'string', description: 'Extension or MIME type fragment, e.g. "pdf"' },
          sender: { type: 'string', description: 'Sender address or name fragment' },
          date_from: { type: 'string', description: `Start date (${DATE_DESCRIPTION})` },
          date_to: { type: 'string', description: `End date (${DATE_DESCRIPTION})` },
          max_results: { type: 'number', description: 'Maximum results (default 10)' },
        },
        required: ['search_text'],
      },
    },
    handler: async (input) => {
      const validationError = validateInput(input, {
        search_text: { type: 'string', required: true },
        file_type: { type: 'string', required: false },
        sender: { type: 'string', required: false },
        date_from: { type: 'string', required: false },
        date_to: { type: 'string', required: false },
        max_results: { type: 'number', required: false, validate: positiveInteger('max_results') },
      });
      if (validationError) return validationError;

      try {
        const result = await searchAttachments(engine, {
          searchText: readString(input, 'search_text') ?? '',
          fileType: readString(input, 'file_type'),
          sender: readString(input, 'sender'),
          dateFrom: readString(input, 'date_from'),
          dateTo: readString(input, 'date_to'),
          maxResults: readNumber(input, 'max_results'),
        });
        return { success: true, ...result };
      } catch (error) {
        return failureResult(error, 'Attachment search failed');
      }
    },
  };

  const categorizeEmailsTool: ToolDefinition = {
    tool: {
      name: 'categorize_emails',
      description: 'Categorize emails (payment requests, service requests, promotional, ...). Use category_filter "payment_request_external" for bills the user has to pay.',
      input_schema: {
        type: 'object' as const,
        properties: {
          date_from: { type: 'string', description: `Start date (${DATE_DESCRIPTION})` },
          date_to: { type: 'string', description: `End date (${DATE_DESCRIPTION})` },
          category_filter: { type: 'string', enum: [...EMAIL_CATEGORIES], description: 'Only return this category' },
          max_results: { type: 'number', description: 'Maximum emails to categorize (default 50)' },
        },
      },
    },
    handler: async (input) => {
      const validationError = validateInput(input, {
        date_from: { type: 'string', required: false },
        date_to: { type: 'string', required: false },
        category_filter: { type: 'string', required: false, validate: oneOf(EMAIL_CATEGORIES, 'category_filter') },
        max_results: { type: 'number', required: false, validate: positiveInteger('max_results') },
      });
      if (validationError) return validationError;

      try {
        const result = await categorizeEmails(engine, {
          dateFrom: readString(input, 'date_from'),
          dateTo: readString(input, 'date_to'),
          categoryFilter: readEnum(input, 'category_filter', EMAIL_CATEGORIES),
          maxResults: readNumber(input, 'max_results'),
        });
        return { success: true, ...result };
      } catch (error) {
        return failureResult(error, 'Categorization failed');
      }
    },
  };

  const priorityInboxTool: ToolDefinition = {
    tool: {
      name: 'get_priority_inbox',
      description: 'Get emails that need attention, ranked by priority with the reasons for each score. Excludes spam and promotional emails.',
      input_schema: {
        type: 'object' as const,
        properties: {
          date_from: { type: 'string', description: `Start date (${DATE_DESCRIPTION})` },
          unread_only: { type: 'boolean', description: 'Only unread emails (default false)' },
          min_priority: { type: 'string', enum: [...PRIORITY_LEVELS], description: 'Lowest level to include' },
          max_results: { type: 'number', description: 'Maximum emails (default 20)' },
        },
      },
    },
    handler: async (input) => {
      const validationError = validateInput(input, {
        date_from: { type: 'string', required: false },
        unread_only: { type: 'boolean', required: false },
        min_priority: { type: 'string', required: false, validate: oneOf(PRIORITY_LEVELS, 'min_priority') },
        max_results: { type: 'number', required: false, validate: positiveInteger('max_results') },
      });
      if (validationError) return validationError;

      try {
        const result = await getPriorityInbox(engine, {
          dateFrom: readString(input, 'date_from'),
          unreadOnly: readBoolean(input, 'unread_only'),
          minPriority: readEnum(input, 'min_priority', PRIORITY_LEVELS),
          maxResults: readNumber(input, 'max_results'),
        });
        return { success: true, ...result };
      } catch (error) {
        return failureResult(error, 'Priority inbox failed');
      }
    },
  };

  const updateEmailTool: ToolDefinition = {
    tool: {
      name: 'update_email',
      description: 'Update an email: read/starred/important flags, labels, category or priority.',
      input_schema: {
        type: 'object' as const,
        properties: {
          email_id: { type: 'string', description: 'Email ID from a search result' },
          updates: {
            type: 'object',
            description: `Fields to change. Allowed: ${UPDATABLE_FIELDS.join(', ')}`,
          },
        },
        required: ['email_id', 'updates'],
      },
    },
    handler: async (input) => {
      const validationError = validateInput(input, {
        email_id: { type: 'string', required: true },
        updates: { type: 'object', required: true },
      });
      if (validationError) return validationError;

      const parsed = parseEmailUpdate(input.updates);
      if (!parsed.success) return { success: false, error: parsed.error };

      const emailId = readString(input, 'email_id') ?? '';
      try {
        const found = await engine.store.update(emailId, parsed.data);
        if (!found) {
          return { success: false, error: `Email not found: ${emailId}` };
        }
        return { success: true, emailId, updated: Object.keys(parsed.data) };
      } catch (error) {
        return failureResult(error, 'Update failed');
      }
    },
  };

  return [
    searchEmailsTool,
    conversationHistoryTool,
    searchAttachmentsTool,
    categorizeEmailsTool,
    priorityInboxTool,
    updateEmailTool,
  ];
}
