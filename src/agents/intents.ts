/**
 * Intent catalog.
 *
 * Capabilities reference these labels in their `intents` list; the router
 * offers the labels of routable capabilities to the classifier. Keywords are
 * only used by the offline keyword provider.
 */

import type { IntentOption } from '../services/provider/types.js';

export const INTENT_CATALOG: Readonly<Record<string, IntentOption>> = {
  general_question: {
    label: 'general_question',
    description: 'Opening hours, locations, policies, delivery, contact details and anything not covered below',
    keywords: ['hours', 'opening', 'address', 'location', 'policy', 'policies', 'contact', 'delivery', 'shipping'],
  },
  billing_issue: {
    label: 'billing_issue',
    description: 'Charges, invoices, payments and refunds on an existing account',
    keywords: ['refund', 'charge', 'invoice', 'bill', 'payment', 'paid', 'money back', 'overcharg'],
  },
  purchase_inquiry: {
    label: 'purchase_inquiry',
    description: 'Buying, prices, plans, subscriptions, upgrades and discounts',
    keywords: ['buy', 'purchase', 'price', 'pricing', 'cost', 'plan', 'subscription', 'upgrade', 'discount', 'quote'],
  },
  technical_issue: {
    label: 'technical_issue',
    description: 'Errors, crashes, connectivity, installation, device problems and outages',
    keywords: ['error', 'crash', 'broken', 'not working', 'install', 'setup', 'set up', 'internet', 'wifi', 'router', 'device', 'outage', 'bug'],
  },
  account_access: {
    label: 'account_access',
    description: 'Login, password and locked-account problems',
    keywords: ['password', 'login', 'log in', 'sign in', 'locked', 'two-factor', '2fa'],
  },
};

/**
 * Intent options for the given labels, skipping labels not in the catalog.
 */
export function intentOptionsFor(labels: readonly string[]): IntentOption[] {
  return labels.flatMap(label => {
    const option = INTENT_CATALOG[label];
    return option ? [option] : [];
  });
}
