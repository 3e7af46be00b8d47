import { Global, Module } from '@nestjs/common';
import { ClerkTokenVerifier } from './clerk-token.verifier';
import { ClerkAuthGuard } from './guards/clerk-auth.guard';

@Global()
@Module({
  providers: [ClerkTokenVerifier, ClerkAuthGuard],
  exports: [ClerkTokenVerifier, ClerkAuthGuard],
})
export class AuthModule {}
