import type { ReadinessEngine } from "../engine/readinessEngine";
import type { CandidateProfile, LearningPath, ReadinessResult } from "../domain/models";
import { UnknownProfileError } from "../errors";
import type { GapPlanOptions } from "../planning/learningPathPlanner";
import type { ProfileProvider } from "../providers";

export class ReadinessService {
  private engine: ReadinessEngine;
  private profiles: ProfileProvider;

  constructor(engine: ReadinessEngine, profiles: ProfileProvider) {
    this.engine = engine;
    this.profiles = profiles;
  }

  public assessCandidate(candidateId: string, roleTitle: string): ReadinessResult {
    return this.engine.assess(this.requireProfile(candidateId), roleTitle);
  }

  public planForCandidate(
    candidateId: string,
    roleTitle: string,
    options?: GapPlanOptions
  ): LearningPath {
    return this.engine.planLearningPath(this.requireProfile(candidateId), roleTitle, options);
  }

  private requireProfile(candidateId: string): CandidateProfile {
    const profile = this.profiles.getProfile(candidateId);
    if (!profile) {
      throw new UnknownProfileError(candidateId);
    }
    return profile;
  }
}
