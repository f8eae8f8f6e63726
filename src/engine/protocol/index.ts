/**
 * Protocol message module.
 *
 * @module engine/protocol
 */

export * from './messages.js';
export { describeIntegrity, toFileStartDescriptor, toFileStartMessage } from './descriptor.js';
