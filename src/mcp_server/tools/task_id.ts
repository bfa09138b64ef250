import { z } from 'zod';

export const taskIdField = z.number().int().positive().describe('Task id');
