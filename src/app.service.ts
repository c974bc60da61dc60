import { Injectable } from '@nestjs/common';

export interface HealthStatus {
  message: string;
  timestamp: string;
}

@Injectable()
export class AppService {
  getHealth(): HealthStatus {
    return {
      message: 'FX rates service is running',
      timestamp: new Date().toISOString(),
    };
  }
}
