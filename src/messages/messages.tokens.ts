export const MESSAGE_REPOSITORY = Symbol('MESSAGE_REPOSITORY');
