import { StateOwner } from '../../src/state/state-owner';
import { StackTimeoutError } from '../../src/stack/errors';

describe('StateOwner', () => {
  describe('call', () => {
    it('should return the result and apply the next state', async () => {
      const owner = new StateOwner<number>(1);

      const result = await owner.call('increment', (n): [string, number] => [`was ${n}`, n + 1]);

      expect(result).toBe('was 1');
      expect(await owner.get('read', (n) => n)).toBe(2);
    });

    it('should run operations one at a time in arrival order', async () => {
      const owner = new StateOwner<number>(0);

      const slow = owner.call('slow', async (n): Promise<[number, number]> => {
        await new Promise((resolve) => setTimeout(resolve, 20));
        return [n, n + 10];
      });
      const fast = owner.call('fast', (n): [number, number] => [n, n + 1]);

      expect(await fast).toBe(10);
      expect(await slow).toBe(0);
    });

    it('should reject and keep the state when the operation throws', async () => {
      const owner = new StateOwner<number>(5);

      await expect(
        owner.call('broken', () => {
          throw new Error('broken transition');
        }),
      ).rejects.toThrow('broken transition');
      expect(await owner.get('read', (n) => n)).toBe(5);
    });

    it('should reject with StackTimeoutError when the mailbox is stuck', async () => {
      const owner = new StateOwner<number>(7, 1000);
      let release: () => void = () => undefined;

      const blocker = owner.call('block', (n) =>
        new Promise<[number, number]>((resolve) => {
          release = () => resolve([n, n]);
        }),
      );
      const waiting = owner.get('read', (n) => n, 20);

      await expect(waiting).rejects.toBeInstanceOf(StackTimeoutError);
      await expect(waiting).rejects.toMatchObject({ operation: 'read', timeoutMs: 20 });

      release();
      await expect(blocker).resolves.toBe(7);
    });
  });

  describe('cast', () => {
    it('should apply casts before calls issued after them', async () => {
      const owner = new StateOwner<string[]>([]);

      owner.cast('a', (s) => [...s, 'a']);
      owner.cast('b', (s) => [...s, 'b']);

      expect(await owner.get('read', (s) => s)).toEqual(['a', 'b']);
    });

    it('should leave the state untouched when an update fails', async () => {
      const owner = new StateOwner<number>(3);

      owner.cast('explode', () => {
        throw new Error('explode');
      });
      owner.cast('increment', (n) => n + 1);

      expect(await owner.get('read', (n) => n)).toBe(4);
    });
  });
});
