import { z } from 'zod';

export const LaunchAcceptedSchema = z.object({
  token: z.string(),
});

export const OutputFileSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export const JobFinishedSchema = z.object({
  output_files: z.array(OutputFileSchema),
});

export type LaunchAccepted = z.infer<typeof LaunchAcceptedSchema>;
export type JobFinished = z.infer<typeof JobFinishedSchema>;
