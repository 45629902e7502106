/**
 * @subfilter/models
 * Proxy node schema and the per-job extra settings
 */

export {
  PROXY_TYPES,
  ProxyTypeSchema,
  ProxyNodeSchema,
  parseProxyNodes,
  describeNode,
  type ProxyType,
  type ProxyNode,
} from "./proxy.js";

export { RegexMatchConfigSchema, type RegexMatchConfig } from "./regex-match.js";

export {
  ExtraSettings,
  ExtraSettingsFieldsSchema,
  ExtraSettingsOptionsSchema,
  type ExtraSettingsFields,
  type ExtraSettingsOptions,
  type ExtraSettingsInit,
} from "./extra-settings.js";
