export { md5, type HashInput } from './primitives';
