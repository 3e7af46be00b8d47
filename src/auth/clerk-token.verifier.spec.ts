import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { verifyToken } from '@clerk/backend';
import { ClerkTokenVerifier, subjectOf } from './clerk-token.verifier';

jest.mock('@clerk/backend', () => ({ verifyToken: jest.fn() }));

describe('ClerkTokenVerifier', () => {
  const mockedVerify = jest.mocked(verifyToken);
  const verifier = (secretKey?: string) =>
    new ClerkTokenVerifier(new ConfigService({ clerk: { secretKey } }));

  beforeEach(() => mockedVerify.mockReset());

  it('returns the sub claim of a valid token', async () => {
    mockedVerify.mockResolvedValue({ sub: 'user_42' } as never);
    await expect(verifier('test-secret').verify('tok')).resolves.toBe(
      'user_42',
    );
    expect(mockedVerify).toHaveBeenCalledWith('tok', {
      secretKey: 'test-secret',
    });
  });

  it('fails closed without a secret key', async () => {
    await expect(verifier().verify('tok')).rejects.toThrow(
      'Server auth configuration error',
    );
    expect(mockedVerify).not.toHaveBeenCalled();
  });

  it('maps a verification error to UnauthorizedException', async () => {
    mockedVerify.mockRejectedValue(new Error('jwt expired'));
    await expect(verifier('test-secret').verify('tok')).rejects.toBeInstanceOf(
      UnauthorizedException,
    );
  });

  it('rejects a payload without a subject', async () => {
    mockedVerify.mockResolvedValue({ sub: '' } as never);
    await expect(verifier('test-secret').verify('tok')).rejects.toThrow(
      'Invalid token payload: no sub claim',
    );
  });
});

describe('subjectOf', () => {
  it('reads sub from a bare payload or a data wrapper', () => {
    expect(subjectOf({ sub: 'user_1' })).toBe('user_1');
    expect(subjectOf({ data: { sub: 'user_2' } })).toBe('user_2');
  });

  it('throws the first wrapped error', () => {
    expect(() =>
      subjectOf({ errors: [new Error('token-expired')] }),
    ).toThrow('token-expired');
  });

  it('returns null when there is no usable subject', () => {
    expect(subjectOf(null)).toBeNull();
    expect(subjectOf({ data: { sub: 42 } })).toBeNull();
  });
});
