import 'dotenv/config';
import { name, version } from '../../package.json';

export const appInfo = {
    name,
    version,
    environment: process.env.NODE_ENV || 'development',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test',
};

export {
    ConfigLoader,
    configLoader,
    getConfig,
    type AppConfig,
    type ConfigLoaderOptions,
    type KemTlsConfig,
    type OidcConfig,
} from './loader';
