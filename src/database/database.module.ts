import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '../config/config.module';
import { ConfigService } from '../config/config.service';
import { GradingSystemEntity } from '../grading/entities/grading-system.entity';
import { SubjectEntity } from '../subjects/entities/subject.entity';
import { SubjectComponentEntity } from '../subjects/entities/subject-component.entity';
import { StudentEntity } from '../marks/entities/student.entity';
import { RawMarkEntity } from '../marks/entities/raw-mark.entity';

export const performanceEntities = [
  GradingSystemEntity,
  SubjectEntity,
  SubjectComponentEntity,
  StudentEntity,
  RawMarkEntity,
];

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get('DB_HOST'),
        port: configService.getNumber('DB_PORT', 5432),
        username: configService.get('DB_USERNAME'),
        password: configService.get('DB_PASSWORD'),
        database: configService.get('DB_DATABASE'),
        entities: performanceEntities,
        // the engine only reads; schema belongs to the main application
        synchronize: false,
        logging: configService.getOptional('NODE_ENV', 'development') === 'development',
      }),
    }),
  ],
})
export class DatabaseModule {}
