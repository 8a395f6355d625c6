import express from "express";
import {
  handleGetConstraints,
  handleGetProfile,
  handleGetUserPreferences,
  handleIngestMessage,
  handleJoinGroup,
  handleLeaveGroup,
  handleRecordSignal,
  handleReportFeasibility
} from "../controllers/preferences.controller";
import { requireApiKey } from "../middleware/auth.middleware";

const router = express.Router();

router.use(requireApiKey);

router.post("/signals", handleRecordSignal);

router.post("/groups/:groupId/messages", handleIngestMessage);
router.get("/groups/:groupId/profile", handleGetProfile);
router.get("/groups/:groupId/profile/constraints", handleGetConstraints);
router.post("/groups/:groupId/feasibility", handleReportFeasibility);

router.post("/groups/:groupId/members", handleJoinGroup);
router.delete("/groups/:groupId/members/:userId", handleLeaveGroup);
router.get("/groups/:groupId/users/:userId/preferences", handleGetUserPreferences);

export default router;
