import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import {
  SIMULATION_CONFIG,
  SimulationConfig,
} from './common/config/simulation.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // DTO 검증 파이프 전역 설정
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // DTO에 없는 속성 제거
      forbidNonWhitelisted: true, // DTO에 없는 속성 있으면 에러
      transform: true, // 자동 타입 변환
    }),
  );

  // 종료 시 Runner 타이머 정리 (OnApplicationShutdown)
  app.enableShutdownHooks();

  // Swagger 설정
  const config = new DocumentBuilder()
    .setTitle('Stake Chain Simulator API')
    .setDescription('단순화된 POS 합의 시뮬레이터 API 문서')
    .setVersion('1.0')
    .addTag('consensus', '합의 라운드 API')
    .addTag('block', '블록 조회 API')
    .addTag('validator', 'Validator 조회 API')
    .addTag('transaction', 'Mempool API')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const { port } = app.get<SimulationConfig>(SIMULATION_CONFIG);
  await app.listen(port);
  console.log(`Application is running on: http://localhost:${port}`);
  console.log(`Swagger UI: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exitCode = 1;
});
