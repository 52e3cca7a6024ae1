import { APIGatewayProxyEvent } from 'aws-lambda';
import { getSubscriberContext, secretsMatch } from '../../../src/lib/auth';
import { AuthenticationError } from '../../../src/lib/errors';
import { buildApiEvent, fakeJwt } from '../../helpers/apiEvents';

describe('auth', () => {
  describe('getSubscriberContext', () => {
    const originalSamLocal = process.env['AWS_SAM_LOCAL'];

    afterEach(() => {
      if (originalSamLocal === undefined) {
        delete process.env['AWS_SAM_LOCAL'];
      } else {
        process.env['AWS_SAM_LOCAL'] = originalSamLocal;
      }
    });

    it('prefers claims from the authorizer', () => {
      const event = buildApiEvent({
        claims: { sub: 'user-claims', email: 'user@example.com' },
        headers: { Authorization: `Bearer ${fakeJwt({ sub: 'user-header' })}` },
      });

      expect(getSubscriberContext(event)).toEqual({ subscriberId: 'user-claims', email: 'user@example.com' });
    });

    it('decodes the bearer token when no authorizer ran', () => {
      const event = buildApiEvent({ headers: { authorization: `Bearer ${fakeJwt({ sub: 'user-1' })}` } });

      expect(getSubscriberContext(event).subscriberId).toBe('user-1');
    });

    it('falls back to the Cognito username claim', () => {
      const event = buildApiEvent({ claims: { 'cognito:username': 'user-2' } });

      expect(getSubscriberContext(event).subscriberId).toBe('user-2');
    });

    it.each<[string, APIGatewayProxyEvent]>([
      ['no credentials', buildApiEvent({})],
      ['a malformed token', buildApiEvent({ headers: { Authorization: 'Bearer not-a-jwt' } })],
      ['a token without subject', buildApiEvent({ headers: { Authorization: `Bearer ${fakeJwt({ email: 'x@example.com' })}` } })],
    ])('rejects %s', (_label, event) => {
      expect(() => getSubscriberContext(event)).toThrow(AuthenticationError);
    });

    it('returns the mock subscriber under sam local', () => {
      process.env['AWS_SAM_LOCAL'] = 'true';

      expect(getSubscriberContext(buildApiEvent({})).subscriberId).toBe('mock-user-id');
    });
  });

  describe('secretsMatch', () => {
    it('compares secrets exactly', () => {
      expect(secretsMatch('test-secret', 'test-secret')).toBe(true);
      expect(secretsMatch('test-secreT', 'test-secret')).toBe(false);
      expect(secretsMatch('test', 'test-secret')).toBe(false);
    });
  });
});
