import { ConstraintView, ProfileFlag } from "./preference.types";
import {
  AnalyzeMessageInput,
  FeasibilityReport,
  MembershipInput,
  RecordSignalInput
} from "../validators/signal.schema";

export type RecordSignalRequest = RecordSignalInput;
export type AnalyzeMessageRequest = AnalyzeMessageInput;
export type MembershipRequest = MembershipInput;
export type FeasibilityReportRequest = FeasibilityReport;

/**
 * What a restaurant filter needs from a profile, without the per-dimension detail.
 */
export interface FilterView extends ConstraintView {
  groupId: string;
  profileVersion: string;
  flags: ProfileFlag[];
  stale: boolean;
}

export interface MembershipChange {
  groupId: string;
  userId: string;
  changed: boolean;
}
