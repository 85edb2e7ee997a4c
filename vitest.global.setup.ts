import { afterEach, beforeEach, vi } from 'vitest';

process.env.NODE_ENV ??= 'test';
process.env.STORAGE_DRIVER ??= 'memory';
process.env.NOTIFIER_DRIVER ??= 'none';
process.env.LOG_LEVEL ??= 'error';
process.env.JWT_ISSUER ??= 'test-issuer';
process.env.JWT_AUDIENCE ??= 'test-audience';
process.env.JWT_PUBLIC_KEY ??= '-----BEGIN PUBLIC KEY-----\ntest-placeholder\n-----END PUBLIC KEY-----';

const RNG_MODULUS = 2147483647;
const RNG_MULTIPLIER = 16807;

const createSeededRandom = () => {
  let seed = 1337;
  return () => {
    seed = (seed * RNG_MULTIPLIER) % RNG_MODULUS;
    return seed / RNG_MODULUS;
  };
};

beforeEach(() => {
  const randomFn = createSeededRandom();
  vi.spyOn(Math, 'random').mockImplementation(randomFn);
});

afterEach(() => {
  vi.restoreAllMocks();
});
