import { Module } from '@nestjs/common'
import { ActivityMetricsModule } from './activity-metrics/activity-metrics.module'

@Module({
  imports: [ActivityMetricsModule],
})
export class AppModule {}
