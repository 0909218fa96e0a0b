export { defaultOutputPath } from './output-path';
export { readStream } from './read-stream';
