/**
 * Native Sign-In Provider Tests
 */

import { NativeSignInProvider, formatDisplayName, mapNativeError } from '../native.provider';
import { FakeNativeController } from '../../../__tests__/utils/mockFactories';
import { mockNativeCredential } from '../../../__tests__/utils/testUtils';

describe('NativeSignInProvider', () => {
  let controller: FakeNativeController;
  let provider: NativeSignInProvider;

  beforeEach(() => {
    controller = new FakeNativeController();
    provider = new NativeSignInProvider(controller);
  });

  it('should request full name and email', async () => {
    const pending = provider.signIn();
    expect(controller.requests).toEqual([['fullName', 'email']]);

    controller.complete(mockNativeCredential());
    await pending;
  });

  it('should build a local native user without a token', async () => {
    const pending = provider.signIn();
    controller.complete(mockNativeCredential());

    const outcome = await pending;

    expect(outcome.type).toBe('success');
    if (outcome.type !== 'success') return;
    expect(outcome.accessToken).toBeNull();
    expect(outcome.user).toMatchObject({
      id: 'native-user-001',
      email: 'native@example.com',
      name: 'Test User',
      provider: 'native',
      profileImageUrl: null,
    });
  });

  it('should fall back to "User" when the name is withheld', async () => {
    const pending = provider.signIn();
    controller.complete(mockNativeCredential({ fullName: null, email: null }));

    const outcome = await pending;

    if (outcome.type !== 'success') throw new Error(`unexpected ${outcome.type}`);
    expect(outcome.user.name).toBe('User');
    expect(outcome.user.email).toBeNull();
  });

  it('should fail on a credential without a user id', async () => {
    const pending = provider.signIn();
    controller.complete(mockNativeCredential({ user: '' }));

    const outcome = await pending;

    expect(outcome).toEqual({
      type: 'failure',
      error: {
        code: 'CREDENTIAL_ERROR',
        message: 'Invalid authentication credential',
        recoverable: true,
      },
    });
  });

  it('should map user cancellation to cancelled', async () => {
    const pending = provider.signIn();
    controller.fail(1001, 'The operation was canceled.');

    await expect(pending).resolves.toEqual({ type: 'cancelled' });
  });

  it('should reject a concurrent call and still deliver the first result', async () => {
    const first = provider.signIn();
    const second = await provider.signIn();

    expect(second.type).toBe('failure');
    if (second.type === 'failure') expect(second.error.code).toBe('SIGN_IN_IN_PROGRESS');
    expect(controller.requests).toHaveLength(1);
    expect(provider.isPending).toBe(true);

    controller.complete(mockNativeCredential());
    await expect(first).resolves.toMatchObject({ type: 'success' });
    expect(provider.isPending).toBe(false);
  });

  it('should report a presentation failure when the sheet cannot be shown', async () => {
    controller.presentError = new Error('no window');

    const outcome = await provider.signIn();

    expect(outcome.type).toBe('failure');
    if (outcome.type === 'failure') {
      expect(outcome.error.code).toBe('PRESENTATION_ERROR');
      expect(outcome.error.message).toBe('Unable to present sign-in interface');
    }
    expect(provider.isPending).toBe(false);
  });

  it('should ignore a delegate callback with no pending sign-in', () => {
    expect(() =>
      provider.didCompleteWithAuthorization(mockNativeCredential())
    ).not.toThrow();
    expect(provider.isPending).toBe(false);
  });
});

describe('mapNativeError', () => {
  it.each<[number, string]>([
    [1000, 'Unknown Apple Sign In error'],
    [1002, 'Invalid response from Apple Sign In'],
    [1003, 'Apple Sign In request was not handled'],
    [1004, 'Apple Sign In failed: Authorization failed'],
    [
      -7026,
      'Apple ID authentication failed. Please check your Apple ID settings and try again.',
    ],
    [
      -1000,
      'Apple Sign In configuration error. Please ensure the app is properly configured for Apple Sign In.',
    ],
  ])('should map code %d to a provider failure', (code, message) => {
    expect(mapNativeError({ code, message: 'Authorization failed' })).toEqual({
      type: 'failure',
      error: { code: 'PROVIDER_ERROR', message, recoverable: true },
    });
  });

  it('should use the platform message for unmapped codes', () => {
    const outcome = mapNativeError({ code: 42, message: 'Something odd happened' });

    expect(outcome.type === 'failure' && outcome.error.message).toBe('Something odd happened');
  });
});

describe('formatDisplayName', () => {
  it('should join and trim name parts', () => {
    expect(formatDisplayName({ givenName: ' Ada ', familyName: 'Lovelace' })).toBe('Ada Lovelace');
    expect(formatDisplayName({ givenName: 'Ada', familyName: null })).toBe('Ada');
  });

  it('should fall back when all parts are blank', () => {
    expect(formatDisplayName({ givenName: '  ', familyName: '' })).toBe('User');
    expect(formatDisplayName(null)).toBe('User');
  });
});
