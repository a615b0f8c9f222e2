export { add, sub, neg, mul, div, transpose, index } from './affine.js';
export { power } from './power.js';
