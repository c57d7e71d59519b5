export { ContactBookConfigModule } from './config.module';
export { default } from './configuration';
