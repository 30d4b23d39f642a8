import { Global, Inject, Module, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ASSIGNMENT_REPOSITORY } from '../assignments/assignment.repository';
import { InMemoryAssignmentRepository } from '../assignments/in-memory-assignment.repository';
import { MysqlAssignmentRepository } from '../assignments/mysql-assignment.repository';
import { PasswordHasher } from '../auth/password-hasher.service';
import { CLOCK, type Clock } from '../common/time/clock';
import { EXAM_DIRECTORY } from '../exams/exam-directory';
import { InMemoryExamDirectory } from '../exams/in-memory-exam.directory';
import { MysqlExamDirectory } from '../exams/mysql-exam.directory';
import { JsonLogger } from '../logging/json-logger.service';
import { CREDENTIAL_STORE } from '../users/credential-store';
import { InMemoryCredentialStore } from '../users/in-memory-credential.store';
import { MysqlCredentialStore } from '../users/mysql-credential.store';
import { DatabaseModule } from './database.module';
import { DatabaseService } from './database.service';
import { applyMemorySeed, readMemorySeed } from './memory-seed';

function usesMemory(config: ConfigService): boolean {
  return config.get<string>('DATA_STORE') === 'memory';
}

/**
 * StorageModule - binds the Credential Store, Exam Directory and Assignment
 * repository to MySQL or to process-owned memory, per DATA_STORE.
 * Also owns PasswordHasher, which the memory seed needs before AuthModule.
 */
@Global()
@Module({
  imports: [DatabaseModule],
  providers: [
    PasswordHasher,
    InMemoryCredentialStore,
    InMemoryExamDirectory,
    InMemoryAssignmentRepository,
    {
      provide: CREDENTIAL_STORE,
      inject: [ConfigService, DatabaseService, InMemoryCredentialStore],
      useFactory: (config: ConfigService, db: DatabaseService, memory: InMemoryCredentialStore) =>
        usesMemory(config) ? memory : new MysqlCredentialStore(db)
    },
    {
      provide: EXAM_DIRECTORY,
      inject: [ConfigService, DatabaseService, InMemoryExamDirectory],
      useFactory: (config: ConfigService, db: DatabaseService, memory: InMemoryExamDirectory) =>
        usesMemory(config) ? memory : new MysqlExamDirectory(db)
    },
    {
      provide: ASSIGNMENT_REPOSITORY,
      inject: [ConfigService, DatabaseService, InMemoryAssignmentRepository],
      useFactory: (config: ConfigService, db: DatabaseService, memory: InMemoryAssignmentRepository) =>
        usesMemory(config) ? memory : new MysqlAssignmentRepository(db)
    }
  ],
  exports: [PasswordHasher, CREDENTIAL_STORE, EXAM_DIRECTORY, ASSIGNMENT_REPOSITORY]
})
export class StorageModule implements OnModuleInit {
  constructor(
    private readonly config: ConfigService,
    private readonly logger: JsonLogger,
    private readonly hasher: PasswordHasher,
    private readonly memoryUsers: InMemoryCredentialStore,
    private readonly memoryExams: InMemoryExamDirectory,
    @Inject(CLOCK) private readonly clock: Clock
  ) {}

  async onModuleInit() {
    if (!usesMemory(this.config)) return;

    const seedPath = this.config.get<string>('MEMORY_SEED_PATH');
    if (!seedPath) {
      this.logger.warn('Memory store started empty (no MEMORY_SEED_PATH)');
      return;
    }

    const seed = await readMemorySeed(seedPath);
    const counts = await applyMemorySeed(
      seed,
      { users: this.memoryUsers, exams: this.memoryExams },
      (plain) => this.hasher.hash(plain),
      this.clock.now()
    );
    this.logger.log('Memory store seeded', { seedPath, ...counts });
  }
}
