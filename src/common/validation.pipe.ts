import { ValidationPipe } from '@nestjs/common';

export const validationPipe = () => new ValidationPipe({
  whitelist: true,                 // strip unknown fields
  forbidNonWhitelisted: true,      // 400 if extra fields are sent
  transform: true,
});
