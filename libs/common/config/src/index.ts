import configuration from './configuration';

export { PortalConfigModule } from './config.module';
export default configuration;
