import { yamlLoader } from './yaml.loader';
import { Config } from '../schema';

export { parseConfig, yamlLoader } from './yaml.loader';

export function loader(): Config {
  const configFile = process.env.CONFIG_FILE || 'config.yaml';
  return yamlLoader(configFile);
}
