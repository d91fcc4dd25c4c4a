import { Router, Request, Response } from "express";
import { z } from "zod";
import { getAssistantService } from "../services/assistant.service";
import { sendError } from "./error-handler";

const router = Router();

const chatSchema = z.object({
    message: z.string().trim().min(1, "Message is required").max(2000)
});

/**
 * POST /chat
 *
 * Body: { message: string }
 * Returns: { intent, answer, context, generated }
 */
router.post('/', async (req: Request, res: Response) => {
    try {
        const { message } = chatSchema.parse(req.body);
        const reply = await getAssistantService().answer(message);
        res.json(reply);
    } catch (error) {
        sendError(res, error, 'Chat');
    }
});

export { router as chatRoutes };
