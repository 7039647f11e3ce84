import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DocumentSequence } from './document-sequence.entity';
import { NumberingService } from './numbering.service';

@Module({
  imports: [TypeOrmModule.forFeature([DocumentSequence])],
  providers: [NumberingService],
  exports: [NumberingService],
})
export class NumberingModule {}
