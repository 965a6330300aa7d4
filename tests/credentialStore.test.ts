import { CredentialStore } from '@/application/auth/CredentialStore.js';

describe('CredentialStore', () => {
  const store = new CredentialStore({ bcryptRounds: 4 });

  it('Given a hashed secret When verified with the same secret Then it matches', async () => {
    const digest = await store.hash('Passw0rd');

    expect(digest).not.toBe('Passw0rd');
    await expect(store.verify('Passw0rd', digest)).resolves.toBe(true);
  });

  it('Given a hashed secret When verified with a different secret Then it does not match', async () => {
    const digest = await store.hash('Passw0rd');

    await expect(store.verify('passw0rd', digest)).resolves.toBe(false);
  });

  it('Given the same secret hashed twice When comparing digests Then each carries its own salt', async () => {
    const first = await store.hash('123456');
    const second = await store.hash('123456');

    expect(first).not.toBe(second);
    await expect(store.verify('123456', first)).resolves.toBe(true);
    await expect(store.verify('123456', second)).resolves.toBe(true);
  });

  it('Given a digest that is not a bcrypt hash When verified Then it reports no match', async () => {
    await expect(store.verify('Passw0rd', 'not-a-hash')).resolves.toBe(false);
  });
});
