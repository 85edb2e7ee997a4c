import type { Application, ApplicationId, Message, MessageId } from '../../../domain/types/message.types';

export type InMemoryMessageStore = {
  applications: Map<ApplicationId, Application>;
  messages: Map<MessageId, Message>;
  /** last issued message id; ids are never reused, even after deletion */
  lastMessageId: number;
};

export const createInMemoryMessageStore = (): InMemoryMessageStore => ({
  applications: new Map(),
  messages: new Map(),
  lastMessageId: 0
});

export const seedApplication = (
  store: InMemoryMessageStore,
  application: Omit<Application, 'defaultPriority'> & Partial<Pick<Application, 'defaultPriority'>>
): Application => {
  const seeded: Application = { defaultPriority: 0, ...application };
  store.applications.set(seeded.id, seeded);
  return seeded;
};
