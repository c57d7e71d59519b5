export { CryptoModule } from './crypto.module';
export { PasswordService } from './password.service';
export { TokenHashService } from './token-hash.service';
