import { AppConfig } from '../config';
import { ConnectionPool } from '../db/transaction-utils';
import { IssueCreateService } from '../issue-create-service';
import { NoteCreateService } from '../note-create-service';
import { ProjectAccessPolicy } from '../project-access-policy';
import { ProjectRepository } from '../repositories/project-repository';
import { SentNotificationRepository } from '../repositories/sent-notification-repository';
import { UserRepository } from '../repositories/user-repository';
import { AttachmentUploader } from './attachment-uploader';
import { EmailReceiverDependencies } from './email-receiver';
import { IncomingEmailAddress } from './incoming-email-address';
import { MailparserMessageParser } from './mime-parser';
import { replyParser } from './reply-parser';
import { LocalUploadStore } from './upload-store';

/**
 * Wire the receiver to Postgres, local uploads and the configured reply address
 */
export function createReceiverDependencies(config: AppConfig, pool: ConnectionPool): EmailReceiverDependencies {
  const users = new UserRepository(pool);
  const projects = new ProjectRepository(pool);

  return {
    parser: new MailparserMessageParser(),
    replyKeys: new IncomingEmailAddress(config.incomingEmail, config.appHost),
    conversations: new SentNotificationRepository(pool, users, projects),
    users,
    projects,
    policy: new ProjectAccessPolicy(pool),
    quoteStripper: replyParser,
    attachments: new AttachmentUploader(new LocalUploadStore(config.uploadsDir, config.uploadsBaseUrl)),
    notes: new NoteCreateService(pool),
    issues: new IssueCreateService(pool)
  };
}
