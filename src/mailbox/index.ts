/**
 * Mailbox Module
 *
 * Mail capability used by delivery and bounce detection:
 * - send(): SMTP via nodemailer
 * - listFailureNotifications(): IMAP search for mailer-daemon / postmaster
 *   messages, headers parsed with mailparser
 */

import { basename } from 'path';
import Imap from 'imap';
import { simpleParser } from 'mailparser';
import * as nodemailer from 'nodemailer';
import type { SendMailOptions, Transporter } from 'nodemailer';
import type { MailboxConfig } from '../config/index.js';
import { MailboxAuthError, toError } from '../errors/index.js';
import { createLogger, type Logger } from '../observability/index.js';

export interface OutreachMessage {
  to: string;
  subject: string;
  text: string;
  attachmentPath?: string | undefined;
}

export interface SendReceipt {
  messageId: string | null;
}

/**
 * A delivery-failure notification, headers keyed by lowercase name
 */
export interface FailureNotification {
  headers: Record<string, string>;
  receivedAt: Date | null;
}

export interface Mailbox {
  send(message: OutreachMessage): Promise<SendReceipt>;
  listFailureNotifications(since: Date): Promise<FailureNotification[]>;
}

export interface MailboxOptions {
  /** Pre-built transport (tests pass a jsonTransport) */
  transport?: Transporter | undefined;
  logger?: Logger | undefined;
  /** Upper bound for the whole IMAP session (default: 60000) */
  imapTimeoutMs?: number | undefined;
}

// ============================================================================
// Header helpers
// ============================================================================

/**
 * Flatten raw header lines ("Name: value", possibly folded) into a record.
 * Repeated headers keep the first value.
 */
export function headerLinesToRecord(lines: ReadonlyArray<{ key: string; line: string }>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const { key, line } of lines) {
    const name = key.toLowerCase();
    if (name in headers) {
      continue;
    }
    const colon = line.indexOf(':');
    headers[name] = line
      .slice(colon + 1)
      .replace(/\r?\n[ \t]+/g, ' ')
      .trim();
  }
  return headers;
}

/**
 * Parse a raw message (or just its header block) into a notification
 */
export async function parseFailureNotification(raw: string | Buffer): Promise<FailureNotification> {
  const parsed = await simpleParser(raw);
  return {
    headers: headerLinesToRecord(parsed.headerLines),
    receivedAt: parsed.date ?? null,
  };
}

function isAuthFailure(error: Error): boolean {
  if ('code' in error && error.code === 'EAUTH') {
    return true;
  }
  if ('textCode' in error && error.textCode === 'AUTHENTICATIONFAILED') {
    return true;
  }
  return 'source' in error && error.source === 'authentication';
}

// ============================================================================
// SMTP + IMAP mailbox
// ============================================================================

export class SmtpImapMailbox implements Mailbox {
  private readonly config: MailboxConfig;
  private readonly logger: Logger;
  private readonly imapTimeoutMs: number;
  private transport: Transporter | null;

  constructor(config: MailboxConfig, options: MailboxOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createLogger('mailbox');
    this.imapTimeoutMs = options.imapTimeoutMs ?? 60000;
    this.transport = options.transport ?? null;
  }

  async send(message: OutreachMessage): Promise<SendReceipt> {
    const { user } = this.credentials();
    const fromAddress = this.config.senderEmail ?? user;

    const mail: SendMailOptions = {
      from: this.config.senderName ? { name: this.config.senderName, address: fromAddress } : fromAddress,
      to: message.to,
      subject: message.subject,
      text: message.text,
    };
    if (message.attachmentPath) {
      mail.attachments = [{ filename: basename(message.attachmentPath), path: message.attachmentPath }];
    }

    try {
      const info: { messageId?: string } = await this.getTransport().sendMail(mail);
      this.logger.debug('Message handed to SMTP server', { to: message.to, messageId: info.messageId });
      return { messageId: info.messageId ?? null };
    } catch (error) {
      const err = toError(error);
      if (isAuthFailure(err)) {
        throw new MailboxAuthError(
          `SMTP login rejected for ${user}; check SMTP_USER / SMTP_PASS (an app password is required for most hosted mailboxes)`,
          { cause: err }
        );
      }
      throw err;
    }
  }

  async listFailureNotifications(since: Date): Promise<FailureNotification[]> {
    const { user, password } = this.credentials();

    return new Promise<FailureNotification[]>((resolve, reject) => {
      const imap = new Imap({
        user,
        password,
        host: this.config.imapHost,
        port: this.config.imapPort,
        tls: true,
        connTimeout: 15000,
        authTimeout: 15000,
      });

      let settled = false;
      const finish = (error: Error | null, notifications: FailureNotification[] = []): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        imap.end();
        if (error) {
          reject(error);
        } else {
          resolve(notifications.filter((n) => n.receivedAt === null || n.receivedAt >= since));
        }
      };

      const timer = setTimeout(() => {
        finish(new Error(`IMAP session exceeded ${this.imapTimeoutMs}ms`));
      }, this.imapTimeoutMs);

      imap.on('error', (error: Error) => {
        if (isAuthFailure(error)) {
          finish(
            new MailboxAuthError(`IMAP login rejected for ${user}; check SMTP_USER / SMTP_PASS`, { cause: error })
          );
        } else {
          finish(error);
        }
      });

      imap.once('ready', () => {
        imap.openBox('INBOX', true, (openError) => {
          if (openError) {
            finish(openError);
            return;
          }

          const criteria = [['OR', ['FROM', 'mailer-daemon'], ['FROM', 'postmaster']], ['SINCE', since]];
          imap.search(criteria, (searchError, uids) => {
            if (searchError) {
              finish(searchError);
              return;
            }
            if (uids.length === 0) {
              finish(null, []);
              return;
            }

            const parses: Promise<FailureNotification>[] = [];
            const fetcher = imap.fetch(uids, { bodies: 'HEADER' });

            fetcher.on('message', (msg) => {
              msg.on('body', (stream) => {
                const chunks: Buffer[] = [];
                stream.on('data', (chunk: Buffer) => chunks.push(chunk));
                parses.push(
                  new Promise<FailureNotification>((resolveParse, rejectParse) => {
                    stream.once('end', () => {
                      parseFailureNotification(Buffer.concat(chunks)).then(resolveParse, rejectParse);
                    });
                  })
                );
              });
            });

            fetcher.once('error', (fetchError: Error) => finish(fetchError));
            fetcher.once('end', () => {
              Promise.all(parses).then(
                (notifications) => {
                  this.logger.info('Failure notifications fetched', { count: notifications.length });
                  finish(null, notifications);
                },
                (parseError: unknown) => finish(toError(parseError))
              );
            });
          });
        });
      });

      imap.connect();
    });
  }

  private credentials(): { user: string; password: string } {
    const { user, password } = this.config;
    if (!user || !password) {
      throw new MailboxAuthError('Mailbox credentials missing; set SMTP_USER and SMTP_PASS');
    }
    return { user, password };
  }

  private getTransport(): Transporter {
    if (!this.transport) {
      const { user, password } = this.credentials();
      this.transport = nodemailer.createTransport({
        host: this.config.smtpHost,
        port: this.config.smtpPort,
        secure: this.config.smtpPort === 465,
        auth: { user, pass: password },
      });
    }
    return this.transport;
  }
}

export function createMailbox(config: MailboxConfig, options: MailboxOptions = {}): Mailbox {
  return new SmtpImapMailbox(config, options);
}
