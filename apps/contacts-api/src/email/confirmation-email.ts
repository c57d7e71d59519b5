/**
 * Confirmation email body
 */

export interface ConfirmationEmailParams {
  username: string;
  link: string;
}

export const CONFIRMATION_SUBJECT = 'Confirm your email';

export function renderConfirmationEmail({ username, link }: ConfirmationEmailParams): string {
  const safeName = escapeHtml(username);
  const safeLink = escapeHtml(link);

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<body>',
    `<p>Hi ${safeName},</p>`,
    '<p>Thanks for signing up to ContactBook. Please confirm your email address:</p>',
    `<p><a href="${safeLink}">Confirm email</a></p>`,
    '<p>The link is valid for 7 days.</p>',
    '</body>',
    '</html>',
  ].join('\n');
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
