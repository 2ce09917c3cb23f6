import { z } from 'zod';

/**
 * Ordered hook stages run for every dispatched message.
 *
 * `send` hands the message to the transport, `post_send` files it as sent,
 * and the optional `post_post` runs follow-up automation such as tagging.
 */
export type DispatchStage = 'send' | 'post_send' | 'post_post';

/**
 * An interpolated command: program followed by its arguments.
 */
export type CommandLine = readonly [program: string, ...args: string[]];

/**
 * A mail identity resolved from one `[account.<name>]` section.
 *
 * Command templates are interpolated once, when the account is built, so
 * every command here is a ready-to-spawn argument list.
 */
export type Account = Readonly<{
  /** Identifier after the `account.` prefix of the section name */
  name: string;
  /** Sender address matched against the message's `From` header */
  fromAddress: string;
  /** Folder substituted for `$sent_folder` in command templates */
  sentFolder: string;
  /** Transport command; receives the message on stdin */
  sendmail: CommandLine;
  /** Sent-mail indexing command; receives the message on stdin */
  postSendmail: CommandLine;
  /** Optional follow-up command; runs without stdin */
  postPost?: CommandLine;
}>;

const SectionValueSchema = z.string({
  error: (issue) => (issue.input === undefined ? 'is required' : 'must be a string'),
});

/**
 * Raw values of one account section after defaults are layered in.
 *
 * Repeated `key[] = value` lines decode to arrays; those are rejected.
 */
export const AccountSectionSchema = z.object({
  from_address: SectionValueSchema.min(1, 'must not be empty'),
  sent_folder: SectionValueSchema.min(1, 'must not be empty'),
  sendmail: SectionValueSchema,
  post_sendmail: SectionValueSchema,
  post_post: SectionValueSchema.optional(),
});

export type AccountSection = z.infer<typeof AccountSectionSchema>;
