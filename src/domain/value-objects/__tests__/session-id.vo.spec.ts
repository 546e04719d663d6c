import { SessionId } from '../session-id.vo';
import { InvalidValueException } from '../../exceptions';

describe('SessionId', () => {
  describe('fromContextName', () => {
    it('should extract the segment between /sessions/ and /contexts/', () => {
      const sessionId = SessionId.fromContextName(
        'projects/food-agent/agent/sessions/4c1d0e2a-77/contexts/ongoing-order',
      );

      expect(sessionId?.value).toBe('4c1d0e2a-77');
    });

    it('should stop at the first /contexts/ segment', () => {
      const sessionId = SessionId.fromContextName(
        'projects/p/agent/sessions/abc/contexts/x/contexts/y',
      );

      expect(sessionId?.value).toBe('abc');
    });

    it('should return null when the name has no session segment', () => {
      expect(SessionId.fromContextName('projects/p/agent/contexts/ongoing-order')).toBeNull();
      expect(SessionId.fromContextName('')).toBeNull();
    });

    it('should return null for an empty session segment', () => {
      expect(SessionId.fromContextName('projects/p/agent/sessions//contexts/x')).toBeNull();
    });
  });

  describe('fromString', () => {
    it('should reject a blank id', () => {
      expect(() => SessionId.fromString('   ')).toThrow(InvalidValueException);
    });

    it('should compare by value', () => {
      expect(SessionId.fromString('s1').equals(SessionId.fromString('s1'))).toBe(true);
      expect(SessionId.fromString('s1').equals(SessionId.fromString('s2'))).toBe(false);
    });
  });
});
