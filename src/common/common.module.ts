import { Global, Module } from '@nestjs/common';
import { RequestContextService } from './context/request-context.service';
import { ResponseInterceptor } from './interceptors/response.interceptor';
import { AllExceptionsFilter } from './filters/all-exceptions.filter';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';

@Global()
@Module({
  providers: [RequestContextService, ResponseInterceptor, AllExceptionsFilter, JwtAuthGuard, RolesGuard],
  exports: [RequestContextService, ResponseInterceptor, AllExceptionsFilter, JwtAuthGuard, RolesGuard],
})
export class CommonModule {}
