import { Request, Response, NextFunction } from "express";
import { preferenceEngine } from "../services/preference-engine.service";

type GroupParams = { groupId: string };
type MemberParams = { groupId: string; userId: string };

export function handleRecordSignal(req: Request, res: Response, next: NextFunction): void {
  preferenceEngine.record(req.body)
    .then(signal => {
      res.status(201).json(signal);
    })
    .catch(next);
}

export function handleIngestMessage(req: Request<GroupParams>, res: Response, next: NextFunction): void {
  preferenceEngine.ingestMessage(req.params.groupId, req.body)
    .then(signals => {
      res.status(201).json({ signals });
    })
    .catch(next);
}

export function handleGetProfile(req: Request<GroupParams>, res: Response, next: NextFunction): void {
  preferenceEngine.getProfile(req.params.groupId)
    .then(profile => {
      res.status(200).json(profile);
    })
    .catch(next);
}

export function handleGetConstraints(req: Request<GroupParams>, res: Response, next: NextFunction): void {
  preferenceEngine.getFilterView(req.params.groupId)
    .then(view => {
      res.status(200).json(view);
    })
    .catch(next);
}

export function handleReportFeasibility(req: Request<GroupParams>, res: Response, next: NextFunction): void {
  preferenceEngine.reportFeasibility(req.params.groupId, req.body)
    .then(view => {
      res.status(200).json(view);
    })
    .catch(next);
}

export function handleJoinGroup(req: Request<GroupParams>, res: Response, next: NextFunction): void {
  preferenceEngine.joinGroup(req.params.groupId, req.body)
    .then(change => {
      res.status(change.changed ? 201 : 200).json(change);
    })
    .catch(next);
}

export function handleLeaveGroup(req: Request<MemberParams>, res: Response, next: NextFunction): void {
  preferenceEngine.leaveGroup(req.params.groupId, req.params.userId)
    .then(change => {
      res.status(200).json(change);
    })
    .catch(next);
}

export function handleGetUserPreferences(req: Request<MemberParams>, res: Response, next: NextFunction): void {
  preferenceEngine.getUserStates(req.params.groupId, req.params.userId)
    .then(states => {
      res.status(200).json({ groupId: req.params.groupId, userId: req.params.userId, states });
    })
    .catch(next);
}
