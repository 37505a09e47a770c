/* eslint-disable no-console */

import { StripeClient } from '../src/StripeClient.js';
import { serializeParams } from '../src/domain/serialize.js';

async function main() {
  const accountId = process.env.STRIPE_ACCOUNT_ID?.trim();
  const client = new StripeClient();

  const account = accountId ? await client.accounts.retrieve(accountId) : await client.accounts.retrieve();

  console.log('Loaded %s (%s)', account.id ?? 'current account', account.email ?? 'no email');

  const firstName = process.env.STRIPE_FIRST_NAME?.trim();

  if (!firstName) {
    console.log('Set STRIPE_FIRST_NAME to update legal_entity.first_name');
    return;
  }

  account.legalEntity.set('first_name', firstName);

  console.log('Sending', JSON.stringify(serializeParams(account)));

  await account.save();

  console.log('Saved; legal_entity.first_name is now %s', account.legalEntity.getString('first_name'));
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
