export {
  loadRulesFromYAML,
  loadRulesFromFile,
  parseRuleDocuments,
  exportRulesToYAML,
  YamlLoadError,
  YamlValidationError,
} from './loader.js';
