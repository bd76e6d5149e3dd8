import * as admin from 'firebase-admin';
import type { firestore } from 'firebase-admin';
import { schedulingConfig } from '../../config';
import { ActionableStepProcessor } from '../actionableStepProcessor';
import { getRedis } from '../redisClient';
import { FirestoreActionableStepRepository } from '../repositories/actionableSteps/FirestoreActionableStepRepository';
import type { ActionableStepRepository } from '../repositories/actionableSteps/ActionableStepRepository';
import { RedisDueCacheRepository } from '../repositories/dueCache/RedisDueCacheRepository';
import type { DueCacheRepository } from '../repositories/dueCache/DueCacheRepository';
import { FirestoreScheduleStateRepository } from '../repositories/scheduleStates/FirestoreScheduleStateRepository';
import type { ScheduleStateRepository } from '../repositories/scheduleStates/ScheduleStateRepository';
import { ScheduleStateService } from '../scheduleStateService';

export type SchedulingServiceContainer = {
  scheduleStateRepository: ScheduleStateRepository;
  actionableStepRepository: ActionableStepRepository;
  dueCacheRepository: DueCacheRepository;
  scheduleStateService: ScheduleStateService;
  actionableStepProcessor: ActionableStepProcessor;
};

export type CreateSchedulingServiceContainerOptions = {
  db: firestore.Firestore;
  scheduleStateRepository?: ScheduleStateRepository;
  actionableStepRepository?: ActionableStepRepository;
  dueCacheRepository?: DueCacheRepository;
  clock?: () => Date;
};

export function createSchedulingServiceContainer(
  options: CreateSchedulingServiceContainerOptions,
): SchedulingServiceContainer {
  const scheduleStateRepository =
    options.scheduleStateRepository ??
    new FirestoreScheduleStateRepository(options.db, schedulingConfig.scheduleStatesCollection);
  const actionableStepRepository =
    options.actionableStepRepository ??
    new FirestoreActionableStepRepository(options.db, schedulingConfig.actionableStepsCollection);
  const dueCacheRepository = options.dueCacheRepository ?? new RedisDueCacheRepository(getRedis());

  const scheduleStateService = new ScheduleStateService({
    scheduleStateRepository,
    dueCacheRepository,
    clock: options.clock,
    dueCacheTtlSeconds: schedulingConfig.dueCacheTtlSeconds,
  });

  return {
    scheduleStateRepository,
    actionableStepRepository,
    dueCacheRepository,
    scheduleStateService,
    actionableStepProcessor: new ActionableStepProcessor({
      actionableStepRepository,
      scheduleStateService,
      clock: options.clock,
    }),
  };
}

let defaultContainer: SchedulingServiceContainer | null = null;

export function getSchedulingServices(): SchedulingServiceContainer {
  if (!defaultContainer) {
    defaultContainer = createSchedulingServiceContainer({ db: admin.firestore() });
  }

  return defaultContainer;
}
