import { afterEach, beforeEach, vi } from 'vitest';

process.env.STORAGE_DRIVER ??= 'memory';
process.env.LOG_LEVEL ??= 'warn';
process.env.HTTP_PORT ??= '8083'; // tests inject, nothing listens

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
