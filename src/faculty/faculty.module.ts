import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { FacultyEntity } from './faculty.entity';
import { CredentialEntity } from './credential.entity';
import { RoomEntity } from '../rooms/room.entity';
import { FacultyService } from './faculty.service';
import { CredentialsService } from './credentials.service';

@Module({
  imports: [TypeOrmModule.forFeature([FacultyEntity, CredentialEntity, RoomEntity])],
  providers: [FacultyService, CredentialsService],
  exports: [FacultyService, CredentialsService],
})
export class FacultyModule {}
