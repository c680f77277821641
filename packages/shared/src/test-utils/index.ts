export { PipeEnd, createStreamPair } from './streamPair';
