// =====================================================
// Submission Service
// =====================================================
// Activity submissions: PENDING -> APPROVED | DECLINED.
// Both outcomes are terminal and reviewing again is a no-op
// that returns the stored submission.

import {
  ERROR_CODES,
  CreateSubmissionInput,
  ParticipantAwardOutcome,
  ReviewResult,
  Submission,
} from '@rank-ledger/shared-types';
import { config } from '../../config';
import { RankTable } from '../../lib/rank-table';
import { logger } from '../../utils/logger';
import { errorMessage, NotFoundError, ValidationError } from '../../utils/errors';
import { LedgerStore } from '../../store/ledger-store';
import { MemberNotifier, SubmissionPresenter } from '../external/types';
import { isEligible } from '../ranks/eligibility';
import { PromotionService } from '../ranks/promotion.service';

export interface SubmissionDeps {
  store: LedgerStore;
  ranks: RankTable;
  promotions: PromotionService;
  notifier: MemberNotifier;
  presenter: SubmissionPresenter;
  minPoints?: number;
  maxPoints?: number;
}

export class SubmissionService {
  private readonly minPoints: number;
  private readonly maxPoints: number;

  constructor(private readonly deps: SubmissionDeps) {
    this.minPoints = deps.minPoints ?? config.submissions.minPoints;
    this.maxPoints = deps.maxPoints ?? config.submissions.maxPoints;
  }

  // ===========================================
  // Create
  // ===========================================

  async create(input: CreateSubmissionInput): Promise<Submission> {
    const participantIds = [...new Set(input.participantIds.map((id) => id.trim()))].filter(
      (id) => id.length > 0
    );

    if (participantIds.length === 0) {
      throw new ValidationError('At least one participant is required', ERROR_CODES.NO_PARTICIPANTS);
    }
    if (input.startTime.getTime() > input.endTime.getTime()) {
      throw new ValidationError('Start time must not be after end time', ERROR_CODES.INVALID_TIME_RANGE);
    }

    const submitter = await this.deps.store.getMember(input.submitterId);
    if (!submitter) {
      throw new NotFoundError(
        'You must link your account before submitting activity',
        ERROR_CODES.MEMBER_NOT_FOUND
      );
    }

    const submission = await this.deps.store.createSubmission({ ...input, participantIds });
    logger.info(
      `Submission #${submission.id} (${submission.eventType}) created by ${submission.submitterId} with ${participantIds.length} participants`
    );

    try {
      await this.deps.presenter.presentSubmission(submission);
    } catch (error) {
      logger.warn(`Could not present submission #${submission.id} for review: ${errorMessage(error)}`);
    }

    return submission;
  }

  async get(id: number): Promise<Submission> {
    const submission = await this.deps.store.getSubmission(id);
    if (!submission) {
      throw new NotFoundError(`Submission #${id} not found`, ERROR_CODES.SUBMISSION_NOT_FOUND);
    }
    return submission;
  }

  async listPending(): Promise<Submission[]> {
    return this.deps.store.listSubmissions('PENDING');
  }

  // ===========================================
  // Review
  // ===========================================

  /**
   * Awards `points` to every participant, promoting those who become
   * eligible. One participant's failure never blocks the others.
   */
  async approve(id: number, points: number, reviewerId: string): Promise<ReviewResult> {
    if (!Number.isInteger(points) || points < this.minPoints || points > this.maxPoints) {
      throw new ValidationError(
        `Points must be a whole number between ${this.minPoints} and ${this.maxPoints}`,
        ERROR_CODES.INVALID_POINTS
      );
    }

    const existing = await this.get(id);
    if (existing.status !== 'PENDING') {
      return { submission: existing, alreadyReviewed: true, participants: [] };
    }

    // Claim the submission before touching any balance
    const claimed = await this.deps.store.transitionSubmission(id, {
      status: 'APPROVED',
      reviewerId,
      pointsAwarded: points,
    });
    if (!claimed) {
      return { submission: await this.get(id), alreadyReviewed: true, participants: [] };
    }

    const participants: ParticipantAwardOutcome[] = [];
    for (const participantId of claimed.participantIds) {
      participants.push(await this.awardParticipant(participantId, points, claimed.id));
    }

    const awarded = participants.filter((p) => p.status === 'AWARDED').length;
    logger.info(
      `Submission #${id} approved by ${reviewerId}: ${points} points to ${awarded}/${participants.length} participants`
    );

    return { submission: claimed, alreadyReviewed: false, participants };
  }

  async decline(id: number, reviewerId: string): Promise<ReviewResult> {
    const existing = await this.get(id);
    if (existing.status !== 'PENDING') {
      return { submission: existing, alreadyReviewed: true, participants: [] };
    }

    const declined = await this.deps.store.transitionSubmission(id, {
      status: 'DECLINED',
      reviewerId,
      pointsAwarded: null,
    });
    if (!declined) {
      return { submission: await this.get(id), alreadyReviewed: true, participants: [] };
    }

    logger.info(`Submission #${id} declined by ${reviewerId}`);

    try {
      await this.deps.notifier.notifySubmissionDeclined(declined, reviewerId);
    } catch (error) {
      logger.warn(`Could not notify ${declined.submitterId} of declined submission #${id}: ${errorMessage(error)}`);
    }

    return { submission: declined, alreadyReviewed: false, participants: [] };
  }

  // ===========================================
  // Private Methods
  // ===========================================

  private async awardParticipant(
    participantId: string,
    points: number,
    submissionId: number
  ): Promise<ParticipantAwardOutcome> {
    const outcome: ParticipantAwardOutcome = {
      participantId,
      status: 'AWARDED',
      pointsAfter: null,
      promotion: null,
      error: null,
    };

    try {
      const current = await this.deps.store.getMember(participantId);
      if (!current) {
        logger.warn(`Submission #${submissionId}: participant ${participantId} is not registered`);
        return { ...outcome, status: 'MEMBER_NOT_FOUND', error: 'Member not registered' };
      }

      const member = await this.deps.store.addPoints(participantId, points);
      outcome.pointsAfter = member.points;

      try {
        await this.deps.notifier.notifyPointsAwarded(member, points, submissionId);
      } catch (error) {
        logger.warn(`Could not notify ${participantId} of awarded points: ${errorMessage(error)}`);
      }

      const eligibleRank = isEligible(this.deps.ranks, member);
      if (eligibleRank) {
        try {
          outcome.promotion = await this.deps.promotions.promote(participantId, {
            targetOrder: eligibleRank.order,
            onlyIfHigher: true,
          });
        } catch (error) {
          outcome.error = `Automatic promotion to ${eligibleRank.name} failed: ${errorMessage(error)}`;
          logger.error(`Submission #${submissionId}: ${outcome.error}`);
        }
      }

      return outcome;
    } catch (error) {
      logger.error(`Submission #${submissionId}: awarding ${participantId} failed:`, error);
      return { ...outcome, status: 'FAILED', error: errorMessage(error) };
    }
  }
}
