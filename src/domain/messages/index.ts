/**
 * @fileoverview Message Exports
 * @module resilient-dispatch/domain/messages
 */

export { MessageBase, CommandBase, QueryBase, isMessage, isCommand, isQuery } from './IMessage';

export type {
  MessageKind,
  MessageMetadata,
  IMessage,
  ICommand,
  IQuery,
  MessageOptions,
  CommandOptions,
} from './IMessage';
