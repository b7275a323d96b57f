export { SqliteBroker, SqliteBrokerOptions, DEFAULT_VISIBILITY_TIMEOUT_MS } from './SqliteBroker';
