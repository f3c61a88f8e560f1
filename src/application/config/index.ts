export {
  DispatchConfigSchema,
  DEFAULT_DISPATCH_CONFIG,
  parseDispatchConfig,
  readDispatchConfigFromEnv,
} from './DispatchConfig';
export type { DispatchConfig, DispatchConfigInput } from './DispatchConfig';
