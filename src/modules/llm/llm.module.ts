import { Module } from '@nestjs/common';
import { LlmController } from './llm.controller';
import { HttpClientService } from './http-client.service';
import { AuthSessionService } from './auth-session.service';
import { ModelGatewayService } from './model-gateway.service';

@Module({
  controllers: [LlmController],
  providers: [HttpClientService, AuthSessionService, ModelGatewayService],
  exports: [AuthSessionService, ModelGatewayService],
})
export class LlmModule {}
