import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DeploymentService } from './deployment.service';
import {
  Deployment,
  DeploymentEnvironment,
  DeploymentStatus,
} from '../database/entities';
import { buildDeployment } from '../common/testing/fixtures';
import { InMemoryRepository } from '../common/testing/in-memory.repository';

describe('DeploymentService', () => {
  let service: DeploymentService;

  const deployments = [
    buildDeployment({
      id: 1,
      environment: DeploymentEnvironment.STAGING,
      startedAt: new Date('2026-01-01T10:00:00.000Z'),
    }),
    buildDeployment({
      id: 2,
      environment: DeploymentEnvironment.PRODUCTION,
      startedAt: new Date('2026-01-02T10:00:00.000Z'),
    }),
    buildDeployment({
      id: 3,
      environment: DeploymentEnvironment.STAGING,
      startedAt: new Date('2026-01-03T10:00:00.000Z'),
    }),
    buildDeployment({
      id: 4,
      environment: DeploymentEnvironment.PRODUCTION,
      status: DeploymentStatus.ROLLED_BACK,
      startedAt: new Date('2026-01-04T10:00:00.000Z'),
    }),
    buildDeployment({
      id: 5,
      environment: DeploymentEnvironment.STAGING,
      startedAt: new Date('2026-01-05T10:00:00.000Z'),
      completedAt: null,
      status: DeploymentStatus.IN_PROGRESS,
    }),
    buildDeployment({
      id: 6,
      environment: DeploymentEnvironment.PRODUCTION,
      isRollback: true,
      previousDeploymentId: 2,
      startedAt: new Date('2026-01-04T11:00:00.000Z'),
    }),
    buildDeployment({
      id: 7,
      environment: DeploymentEnvironment.PRODUCTION,
      isRollback: true,
      previousDeploymentId: 404,
      startedAt: new Date('2026-01-04T12:00:00.000Z'),
    }),
  ];

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DeploymentService,
        {
          provide: getRepositoryToken(Deployment),
          useValue: new InMemoryRepository(deployments),
        },
      ],
    }).compile();

    service = module.get<DeploymentService>(DeploymentService);
  });

  describe('getDeployments', () => {
    it('should return only deployments of the requested environment', async () => {
      const result = await service.getDeployments({
        environment: DeploymentEnvironment.STAGING,
      });

      expect(result.count).toBe(3);
      expect(result.deployments.map((d) => d.id)).toEqual([5, 3, 1]);
      expect(
        result.deployments.every((d) => d.environment === 'staging'),
      ).toBe(true);
    });

    it('should order by startedAt descending across environments', async () => {
      const result = await service.getDeployments({});

      expect(result.deployments.map((d) => d.id)).toEqual([5, 7, 6, 4, 3, 2, 1]);
      const startedAt = result.deployments.map((d) => d.started_at ?? '');
      for (let i = 1; i < startedAt.length; i++) {
        expect(startedAt[i - 1] >= startedAt[i]).toBe(true);
      }
    });

    it('should never return more than limit rows', async () => {
      for (const limit of [0, 1, 2, 50]) {
        const result = await service.getDeployments({ limit });
        expect(result.deployments.length).toBeLessThanOrEqual(limit);
        expect(result.count).toBe(result.deployments.length);
      }
    });

    it('should serialize an unfinished deployment with completed_at null', async () => {
      const result = await service.getDeployments({ limit: 1 });

      expect(result.deployments[0]).toEqual({
        id: 5,
        build_number: '42',
        job_name: 'web-app',
        environment: 'staging',
        status: 'in_progress',
        version_tag: 'v1.2.0',
        deployed_by: 'ci-bot',
        started_at: '2026-01-05T10:00:00.000Z',
        completed_at: null,
        is_rollback: false,
      });
    });
  });

  describe('getDeploymentById', () => {
    it('should include a one-level summary of the previous deployment', async () => {
      const result = await service.getDeploymentById(6);

      expect(result.is_rollback).toBe(true);
      expect(result.previous_deployment_id).toBe(2);
      expect(result.previous_deployment).toEqual(
        expect.objectContaining({ id: 2, environment: 'production' }),
      );
    });

    it('should return previous_deployment null when there is no link', async () => {
      const result = await service.getDeploymentById(1);

      expect(result.previous_deployment_id).toBeNull();
      expect(result.previous_deployment).toBeNull();
    });

    it('should return previous_deployment null when the linked row is gone', async () => {
      const result = await service.getDeploymentById(7);

      expect(result.previous_deployment_id).toBe(404);
      expect(result.previous_deployment).toBeNull();
    });

    it('should throw NotFoundException for an unknown id', async () => {
      await expect(service.getDeploymentById(99)).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });

    it('should answer 404 for ids beyond the integer key range', async () => {
      await expect(service.getDeploymentById(2147483648)).rejects.toThrow(
        new NotFoundException('Deployment 2147483648 not found'),
      );
    });
  });
});
