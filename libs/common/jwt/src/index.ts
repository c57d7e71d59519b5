export { JwtModule } from './jwt.module';
export { JwtService } from './jwt.service';
export {
  TokenPurpose,
  TokenClaims,
  IssuedToken,
  JwtAlgorithm,
  SUPPORTED_ALGORITHMS,
  isJwtAlgorithm,
  isTokenClaims,
} from './jwt.types';
