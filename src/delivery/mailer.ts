import nodemailer from 'nodemailer';
import { DeliveryError, errorMessage } from '../utils/errors';
import { silentLogger, type DigestLogger } from '../utils/logger';

export interface SmtpSettings {
  host: string;
  port: number;
  username: string | null;
  password: string | null;
  useTls: boolean;
}

export interface DigestEmail {
  from: string;
  to: string[];
  subject: string;
  html: string;
}

export function createTransport(smtp: SmtpSettings) {
  const auth = smtp.username && smtp.password ? { user: smtp.username, pass: smtp.password } : undefined;
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: false,
    // STARTTLS upgrade on a plain connection, as on port 587
    requireTLS: smtp.useTls,
    ignoreTLS: !smtp.useTls,
    auth
  });
}

/**
 * Hand the rendered digest to the SMTP relay.
 * @returns the relay's message id
 */
export async function sendDigestEmail(
  smtp: SmtpSettings,
  email: DigestEmail,
  logger: DigestLogger = silentLogger
): Promise<string> {
  const transporter = createTransport(smtp);
  try {
    const info = await transporter.sendMail({
      from: email.from,
      to: email.to.join(', '),
      subject: email.subject,
      html: email.html
    });
    logger.info(`Email sent to ${email.to.length} recipient(s)`, { messageId: info.messageId });
    return info.messageId;
  } catch (error) {
    throw new DeliveryError(`Failed to send email: ${errorMessage(error)}`, { cause: error });
  } finally {
    transporter.close();
  }
}
