/**
 * Stand-ins for the Redis connection and the event notifier so that
 * services publishing events never open a socket in tests.
 */
export const createMockRedisService = () => ({
  publish: jest.fn().mockResolvedValue(1),
  subscribe: jest.fn().mockResolvedValue(undefined),
  markEventProcessed: jest.fn().mockResolvedValue(true),
  releaseEvent: jest.fn().mockResolvedValue(undefined),
  ping: jest.fn().mockResolvedValue('PONG'),
});

export const createMockEventEmitter = () => ({
  emit: jest.fn().mockReturnValue(true),
  emitAsync: jest.fn().mockResolvedValue([]),
});

export const createMockEventNotifier = () => ({
  publish: jest.fn(),
});
