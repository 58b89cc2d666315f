/**
 * src/shared/messaging/email-templates.ts
 *
 * Plain-text bodies for every QueueMessage. No HTML.
 */

import type { QueueMessage } from './queue';

export type EmailContent = {
  to: string;
  subject: string;
  text: string;
};

export type EmailBranding = {
  chapterName: string;
  siteUrl: string;
};

function formatDate(iso: string): string {
  return iso.slice(0, 10);
}

export function renderEmail(message: QueueMessage, branding: EmailBranding): EmailContent {
  switch (message.type) {
    case 'invitation.code-email': {
      const greeting = message.firstName ? `Hello ${message.firstName},` : 'Hello,';
      const expiry = message.expiresAt
        ? `This code expires on ${formatDate(message.expiresAt)}.`
        : 'This code does not expire, but it can be used only once.';

      return {
        to: message.email,
        subject: `${branding.chapterName} - Your member portal invitation`,
        text: [
          greeting,
          '',
          `You have been invited to activate your ${branding.chapterName} member portal account.`,
          '',
          `Invitation code: ${message.code}`,
          `Sign up at: ${branding.siteUrl}/signup`,
          '',
          expiry,
          'Use this email address when you sign up.',
        ].join('\n'),
      };
    }

    case 'compliance.removal-notice-email':
      return {
        to: message.email,
        subject: `${branding.chapterName} - Dues payment required`,
        text: [
          `Hello ${message.displayName},`,
          '',
          `Your membership has been flagged: ${message.reason}.`,
          `You must bring your dues current within ${message.daysRemaining} days ` +
            `(by ${formatDate(message.removalDate)}) to keep access to the member portal.`,
          '',
          'If you have already paid, please contact an officer to update your status.',
          '',
          `Member portal: ${branding.siteUrl}/portal/dues/`,
          '',
          '---',
          branding.chapterName,
        ].join('\n'),
      };
  }
}
