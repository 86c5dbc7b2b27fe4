import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import aiConfig from './config/ai.config';
import chatConfig from './config/chat.config';
import { validateEnvironment } from './config/env.validation';
import { CoreModule } from './modules/core/core.module';
import { ChatModule } from './modules/chat/chat.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [aiConfig, chatConfig],
      validate: validateEnvironment,
    }),
    CoreModule,
    ChatModule,
  ],
  controllers: [HealthController],
})
export class AppModule { }
