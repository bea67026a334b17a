export { RefreshToken } from './entities/refresh-token.entity';
export type { IRefreshTokenStore, NewRefreshToken } from './refresh-token-store.interface';
export { REFRESH_TOKEN_STORE } from './refresh-token-store.interface';
export { TypeOrmRefreshTokenStore } from './typeorm-refresh-token.store';
export { RefreshTokenService } from './refresh-token.service';
