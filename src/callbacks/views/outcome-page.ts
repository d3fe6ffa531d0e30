import { TransactionStatus } from '../../transactions/types/transaction.types';
import { OutcomeView, RedirectOutcome } from '../types/callback.types';

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, char => ESCAPES[char] ?? char);

function headline(view: OutcomeView): string {
  if (view.suspiciousActivity) {
    return 'Payment could not be verified';
  }
  switch (view.status) {
    case TransactionStatus.SUCCESS:
      return 'Payment successful';
    case TransactionStatus.FAILED:
      return 'Payment failed';
    case null:
      return view.outcome === RedirectOutcome.SUCCESS ? 'Payment received' : 'Payment not completed';
    default:
      return 'Payment pending';
  }
}

function row(label: string, value: string | null): string {
  return value ? `<tr><th>${escapeHtml(label)}</th><td>${escapeHtml(value)}</td></tr>` : '';
}

export function renderOutcomePage(view: OutcomeView): string {
  const title = headline(view);
  const warning = view.suspiciousActivity
    ? '<p class="warning" role="alert">Suspicious activity detected: the payment details could not be ' +
      'authenticated. This payment has been flagged for manual review.</p>'
    : '';

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    '</head>',
    `<body class="${view.outcome}">`,
    `<h1>${escapeHtml(title)}</h1>`,
    warning,
    '<table>',
    row('Transaction ID', view.txnid),
    row('Amount', view.amount),
    row('Status', view.status),
    row('Product', view.productInfo),
    row('Name', view.firstName),
    row('Gateway reference', view.gatewayTxnId),
    row('Bank reference', view.bankRefNum),
    row('Payment mode', view.paymentMode),
    row('Message', view.errorMessage),
    '</table>',
    '</body>',
    '</html>',
  ]
    .filter(line => line !== '')
    .join('\n');
}
