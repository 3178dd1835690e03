import { Module } from '@nestjs/common';
import { RetreatsModule } from '../retreats';
import { RecommendationsController } from './recommendations.controller';
import { RecommendationsService } from './recommendations.service';

@Module({
    imports: [RetreatsModule],
    controllers: [RecommendationsController],
    providers: [RecommendationsService],
})
export class RecommendationsModule { }
