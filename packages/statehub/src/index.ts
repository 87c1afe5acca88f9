export * from 'statehub-core';

export { StateConsumer } from './consumer.js';
export { StateHub } from './hub.js';
export { createHubProvider, type HubProvider, type HubProviderOptions, type HubScope } from './provider.js';
