import { Mutex, Semaphore } from 'async-mutex';
import { FailedEvent } from '../failed-event/failed-event';
import { ConcurrencyController } from './concurrency-controller';

/**
 * Failed events of the same device (IMEI) are processed one after the other
 * in the order in which the locks were requested. Up to `maxParallel` devices
 * are processed in parallel.
 * @param maxParallel The maximum number of failed events that are processed at the same time
 * @returns The controller to acquire and release the locks
 */
export const createImeiConcurrencyController = (
  maxParallel: number,
): ConcurrencyController => {
  const semaphore = new Semaphore(Math.max(maxParallel, 1));
  const mutexMap = new Map<string, { mutex: Mutex; users: number }>();

  const getMutex = (imei: string) => {
    let entry = mutexMap.get(imei);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      mutexMap.set(imei, entry);
    }
    entry.users++;
    return entry;
  };

  const releaseMutex = (imei: string, release: () => void) => {
    release();
    const entry = mutexMap.get(imei);
    if (entry && --entry.users === 0) {
      mutexMap.delete(imei);
    }
  };

  return {
    acquire: async ({ imei }: FailedEvent): Promise<() => void> => {
      const entry = getMutex(imei);
      const releaseImei = await entry.mutex
        .acquire()
        .catch((error: unknown) => {
          releaseMutex(imei, () => undefined);
          throw error;
        });
      try {
        // eslint-disable-next-line @typescript-eslint/no-unused-vars
        const [_, releaseSemaphore] = await semaphore.acquire();
        return () => {
          releaseSemaphore();
          releaseMutex(imei, releaseImei);
        };
      } catch (error) {
        releaseMutex(imei, releaseImei);
        throw error;
      }
    },
  };
};
