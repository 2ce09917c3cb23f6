import { simpleParser } from 'mailparser';
import type { ParsedMail } from 'mailparser';

import { MessageError } from '../errors.js';

/**
 * Parse a raw RFC822 source buffer into a structured ParsedMail.
 */
export function parseMailSource(source: Buffer): Promise<ParsedMail> {
  return simpleParser(source);
}

/**
 * Bare address of the first `From` mailbox, display name stripped.
 *
 * @throws MessageError when the header is missing or holds no address
 */
export async function readSenderAddress(source: Buffer): Promise<string> {
  const parsed = await parseMailSource(source);
  const address = parsed.from?.value[0]?.address;
  if (!address) {
    throw new MessageError('Message is malformed: no From address');
  }
  return address;
}
