import { Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';
import {
  ApprovalRequest,
  ApprovalStatus,
} from '../entities/approval-request.entity';
import {
  Deployment,
  DeploymentEnvironment,
  DeploymentStatus,
} from '../entities/deployment.entity';
import {
  NotificationLog,
  NotificationType,
} from '../entities/notification-log.entity';

/**
 * 배포 이력과 알림 기록. ApprovalSeeder 이후에 실행한다.
 */
export class DeploymentSeeder {
  private readonly logger = new Logger(DeploymentSeeder.name);

  constructor(private readonly manager: EntityManager) {}

  async run(): Promise<void> {
    const deploymentRepository = this.manager.getRepository(Deployment);
    const notificationRepository =
      this.manager.getRepository(NotificationLog);
    const approvalRepository = this.manager.getRepository(ApprovalRequest);

    const existing = await deploymentRepository.count();
    if (existing > 0) {
      this.logger.log('Deployments already seeded, skipping...');
      return;
    }

    const approved = await approvalRepository.findOne({
      where: { status: ApprovalStatus.APPROVED },
      order: { requestedAt: 'DESC' },
    });

    const now = Date.now();
    const hoursAgo = (hours: number) => new Date(now - hours * 3_600_000);

    const staging = await deploymentRepository.save(
      deploymentRepository.create({
        buildNumber: '101',
        jobName: 'web-app',
        environment: DeploymentEnvironment.STAGING,
        status: DeploymentStatus.SUCCESS,
        gitCommit: '9f8e7d6c5b4a',
        gitBranch: 'main',
        versionTag: 'v1.4.0',
        imageTag: 'web-app:101',
        deployedBy: 'ci-bot',
        backendUrl: 'http://localhost:5001',
        frontendUrl: 'http://localhost:3000',
        startedAt: hoursAgo(27),
        completedAt: hoursAgo(26.9),
      }),
    );

    const production = await deploymentRepository.save(
      deploymentRepository.create({
        buildNumber: '101',
        jobName: 'web-app',
        environment: DeploymentEnvironment.PRODUCTION,
        status: DeploymentStatus.ROLLED_BACK,
        gitCommit: '9f8e7d6c5b4a',
        gitBranch: 'main',
        versionTag: 'v1.4.0',
        imageTag: 'web-app:101',
        deployedBy: 'release-manager',
        startedAt: hoursAgo(25),
        completedAt: hoursAgo(24.9),
        approvalId: approved?.id ?? null,
      }),
    );

    const rollback = await deploymentRepository.save(
      deploymentRepository.create({
        buildNumber: '99',
        jobName: 'web-app',
        environment: DeploymentEnvironment.PRODUCTION,
        status: DeploymentStatus.SUCCESS,
        gitCommit: '0011223344ff',
        gitBranch: 'main',
        versionTag: 'v1.3.2',
        imageTag: 'web-app:99',
        deployedBy: 'release-manager',
        deploymentNotes: 'Rolled back after elevated error rate',
        isRollback: true,
        previousDeploymentId: production.id,
        startedAt: hoursAgo(24),
        completedAt: hoursAgo(23.9),
      }),
    );

    await notificationRepository.save([
      notificationRepository.create({
        notificationType: NotificationType.SLACK,
        recipient: '#deployments',
        subject: 'Approval requested',
        message: `Build ${staging.buildNumber} is ready for review`,
        approvalId: approved?.id ?? null,
        deploymentId: staging.id,
        sentSuccessfully: true,
        sentAt: hoursAgo(26.9),
      }),
      notificationRepository.create({
        notificationType: NotificationType.EMAIL,
        recipient: 'oncall@example.com',
        subject: 'Production rollback',
        message: `Rolled back to ${rollback.versionTag ?? rollback.buildNumber}`,
        deploymentId: rollback.id,
        sentSuccessfully: false,
        errorMessage: 'SMTP connection refused',
        sentAt: hoursAgo(23.9),
      }),
    ]);

    this.logger.log('Seeded 3 deployments and 2 notifications');
  }
}
