export * from './config';
export * from './modules';
export * from './controllers';
export * from './decorators';
export * from './dto';
export { configureApp, listenPort, resolveLogLevels, API_PREFIX } from './bootstrap';
