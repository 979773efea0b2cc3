// Decay
export { decayFactor, computeDecayState, EXPONENTIAL_DECAY_RATE } from './decay.js';
