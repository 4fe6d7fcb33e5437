import { Module } from '@nestjs/common';
import { AutomationAgent } from './application/ports/automation-agent';
import { MovieParser } from './application/ports/movie-parser';
import { RoleGrantor } from './application/ports/role-grantor';
import { VideoSync } from './application/ports/video-sync';
import { Bk2MovieParser } from '@movies/infrastructure/bk2-movie-parser';
import { KyselyAutomationAgent } from './infrastructure/kysely-automation-agent';
import { KyselyRoleGrantor } from './infrastructure/kysely-role-grantor';
import { YouTubeVideoSync } from './infrastructure/youtube-video-sync';

@Module({
  providers: [
    {
      provide: VideoSync,
      useClass: YouTubeVideoSync,
    },
    {
      provide: AutomationAgent,
      useClass: KyselyAutomationAgent,
    },
    {
      provide: RoleGrantor,
      useClass: KyselyRoleGrantor,
    },
    {
      provide: MovieParser,
      useClass: Bk2MovieParser,
    },
  ],
  exports: [VideoSync, AutomationAgent, RoleGrantor, MovieParser],
})
export class CollaboratorsModule {}
