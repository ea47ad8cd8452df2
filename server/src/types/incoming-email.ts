/**
 * Incoming Email Types
 * Domain records and the collaborator contracts the email receiver depends on
 */

export type Capability = 'create_note' | 'create_issue';

export type ProjectVisibility = 'private' | 'internal' | 'public';

export interface User {
  id: number;
  username: string;
  email: string;
  blocked: boolean;
  admin: boolean;
}

export interface Project {
  id: number;
  fullPath: string;
  visibility: ProjectVisibility;
  archived: boolean;
}

export const NOTEABLE_TYPES = ['Issue', 'MergeRequest', 'Commit', 'Snippet'] as const;

export type NoteableType = typeof NOTEABLE_TYPES[number];

export function isNoteableType(value: unknown): value is NoteableType {
  return typeof value === 'string' && (NOTEABLE_TYPES as readonly string[]).includes(value);
}

/**
 * The record a reply is attached to. Commits are referenced by SHA, everything else by id.
 */
export type NoteableReference =
  | { type: 'Commit'; commitId: string }
  | { type: Exclude<NoteableType, 'Commit'>; id: number };

/**
 * A notification email that was sent out with a reply key (a "sent notification")
 */
export interface ConversationContext {
  replyKey: string;
  recipient: User | null;
  project: Project | null;
  /** null when the discussed record no longer exists */
  noteable: NoteableReference | null;
  // Threading metadata, passed through to note creation untouched
  noteableType: string;
  noteableId: number | null;
  commitId: string | null;
  lineCode: string | null;
}

export interface MessageAttachment {
  filename?: string;
  contentType: string;
  content: Buffer;
}

export interface ParsedMessage {
  messageId?: string;
  /** Sender addresses, lower-cased, in header order */
  from: string[];
  /** Recipient addresses, lower-cased, in header order */
  to: string[];
  /** Message ids from the References header without angle brackets */
  references: string[];
  subject: string;
  /** Raw header lines, used for auto-reply detection */
  headerBlob: string;
  body: string;
  attachments: MessageAttachment[];
}

export interface UploadedAttachment {
  alt: string;
  url: string;
  isImage: boolean;
  markdown: string;
}

export interface Note {
  id: number;
  projectId: number;
  authorId: number;
  note: string;
  noteableType: string;
  noteableId: number | null;
  commitId: string | null;
  lineCode: string | null;
}

export interface Issue {
  id: number;
  iid: number;
  projectId: number;
  authorId: number;
  title: string;
  description: string;
}

export interface CreationResult<T> {
  persisted: boolean;
  errors: string[];
  record: T | null;
}

export interface CreateNoteParams {
  project: Project;
  author: User;
  note: string;
  noteableType: string;
  noteableId: number | null;
  commitId: string | null;
  lineCode: string | null;
}

export interface CreateIssueParams {
  project: Project;
  author: User;
  title: string;
  description: string;
}

// Collaborator contracts

export interface MessageParser {
  parse(raw: string | Buffer): Promise<ParsedMessage>;
}

export interface ReplyKeyScheme {
  keyFromAddress(address: string): string | null;
  keyFromFallbackReplyMessageId(messageId: string): string | null;
}

export interface ConversationContextStore {
  findByReplyKey(replyKey: string): Promise<ConversationContext | null>;
}

export interface UserLookup {
  findByAnyEmail(email: string): Promise<User | null>;
}

export interface ProjectResolver {
  findByRoutingKey(routingKey: string): Promise<Project | null>;
}

export interface AuthorizationPolicy {
  hasCapability(user: User, project: Project, capability: Capability): Promise<boolean>;
}

export interface QuoteStripper {
  extractReply(message: ParsedMessage): string;
}

export interface AttachmentProcessor {
  process(message: ParsedMessage, project: Project): Promise<UploadedAttachment[]>;
}

export interface NoteCreator {
  create(params: CreateNoteParams): Promise<CreationResult<Note>>;
}

export interface IssueCreator {
  create(params: CreateIssueParams): Promise<CreationResult<Issue>>;
}
