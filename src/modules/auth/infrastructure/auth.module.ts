import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { IPrincipalResolverToken } from '../domain/principal-resolver.interface';
import { PrincipalGuard } from '../interfaces/guards/principal.guard';
import { JwtPrincipalResolver } from './jwt-principal.resolver';

/**
 * Tokens are issued by the surrounding application; this service only
 * verifies them.
 */
@Global()
@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        secret: configService.get<string>('jwt.secret'),
      }),
    }),
  ],
  providers: [
    { provide: IPrincipalResolverToken, useClass: JwtPrincipalResolver },
    PrincipalGuard,
  ],
  exports: [IPrincipalResolverToken, PrincipalGuard],
})
export class AuthModule {}
