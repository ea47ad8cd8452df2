/**
 * EmailReceiver
 *
 * Decides what an inbound email to the reply address means and acts on it:
 * a reply to a notification becomes a note on the discussed record, a mail
 * to a project's address becomes a new issue. Anything else is rejected
 * with a ProcessingError naming the reason.
 */

import { checkInput } from './authorization';
import {
  AttachmentProcessor,
  AuthorizationPolicy,
  ConversationContext,
  ConversationContextStore,
  IssueCreator,
  MessageParser,
  NoteCreator,
  ParsedMessage,
  Project,
  ProjectResolver,
  QuoteStripper,
  ReplyKeyScheme,
  User,
  UserLookup
} from '../../types/incoming-email';
import {
  AutoGeneratedEmailError,
  EmptyInputError,
  EmptyReplyError,
  InvalidIssueError,
  InvalidNoteError,
  NoteableNotFoundError,
  RoutingNotFoundError
} from '../../types/incoming-email-errors';

const AUTO_GENERATED_PATTERN = /auto-(generated|replied)/i;

export interface EmailReceiverDependencies {
  parser: MessageParser;
  replyKeys: ReplyKeyScheme;
  conversations: ConversationContextStore;
  users: UserLookup;
  projects: ProjectResolver;
  policy: AuthorizationPolicy;
  quoteStripper: QuoteStripper;
  attachments: AttachmentProcessor;
  notes: NoteCreator;
  issues: IssueCreator;
}

export type ReceiverRoute = 'reply' | 'new-issue';

/**
 * First candidate for which `extract` yields a key
 */
export function firstKey(candidates: readonly string[], extract: (candidate: string) => string | null): string | null {
  for (const candidate of candidates) {
    const key = extract(candidate);
    if (key) return key;
  }
  return null;
}

/**
 * Reply key from the To addresses, or failing that from the References ids.
 * To is searched exhaustively before References is looked at.
 */
export function resolveReplyKey(message: ParsedMessage, scheme: ReplyKeyScheme): string | null {
  return firstKey(message.to, address => scheme.keyFromAddress(address))
    ?? firstKey(message.references, messageId => scheme.keyFromFallbackReplyMessageId(messageId));
}

export function isBlank(raw: string | Buffer): boolean {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  return text.trim() === '';
}

export class EmailReceiver {
  constructor(private raw: string | Buffer, private deps: EmailReceiverDependencies) {}

  async execute(): Promise<ReceiverRoute> {
    if (isBlank(this.raw)) {
      throw new EmptyInputError();
    }

    const message = await this.deps.parser.parse(this.raw);
    const replyKey = resolveReplyKey(message, this.deps.replyKeys);

    const context = replyKey ? await this.deps.conversations.findByReplyKey(replyKey) : null;
    if (context) {
      await this.processReply(message, context);
      return 'reply';
    }

    const project = replyKey ? await this.deps.projects.findByRoutingKey(replyKey) : null;
    if (project) {
      await this.processCreateIssue(message, project);
      return 'new-issue';
    }

    // Also covers a project the sender cannot see, which looks the same from here
    throw new RoutingNotFoundError();
  }

  private async processReply(message: ParsedMessage, context: ConversationContext): Promise<void> {
    if (AUTO_GENERATED_PATTERN.test(message.headerBlob)) {
      throw new AutoGeneratedEmailError();
    }

    const { author, project } = await checkInput(context.recipient, context.project, 'create_note', this.deps.policy);

    if (!context.noteable) {
      throw new NoteableNotFoundError();
    }

    const result = await this.deps.notes.create({
      project,
      author,
      note: await this.extractReply(message, project),
      noteableType: context.noteableType,
      noteableId: context.noteableId,
      commitId: context.commitId,
      lineCode: context.lineCode
    });

    if (!result.persisted) {
      throw new InvalidNoteError(result.errors);
    }

    console.log(`[EmailReceiver] Added note ${result.record?.id ?? '?'} to ${context.noteableType} in ${project.fullPath}`);
  }

  private async processCreateIssue(message: ParsedMessage, project: Project): Promise<void> {
    const sender = await this.findSender(message);
    const { author } = await checkInput(sender, project, 'create_issue', this.deps.policy);

    const result = await this.deps.issues.create({
      project,
      author,
      title: message.subject,
      description: await this.extractReply(message, project)
    });

    if (!result.persisted) {
      throw new InvalidIssueError(result.errors);
    }

    console.log(`[EmailReceiver] Created issue #${result.record?.iid ?? '?'} in ${project.fullPath}`);
  }

  /**
   * First From address that belongs to a known user
   */
  private async findSender(message: ParsedMessage): Promise<User | null> {
    for (const address of message.from) {
      const user = await this.deps.users.findByAnyEmail(address);
      if (user) return user;
    }
    return null;
  }

  /**
   * Reply text without quoted history, with one link per uploaded attachment appended.
   * Uploads the attachments, so it runs once per message.
   */
  private async extractReply(message: ParsedMessage, project: Project): Promise<string> {
    const reply = this.deps.quoteStripper.extractReply(message).trim();

    if (reply === '') {
      throw new EmptyReplyError();
    }

    const attachments = await this.deps.attachments.process(message, project);

    return [reply, ...attachments.map(attachment => attachment.markdown)].join('\n\n');
  }
}
