import { z } from 'zod';

export interface ToolSpec<T extends z.ZodTypeAny> {
  name: string;
  description: string;
  schema: T;
  /** Tools that reach the network. */
  network?: boolean;
  run(args: z.infer<T>): Promise<unknown>;
}

export type AnyToolSpec = ToolSpec<z.ZodTypeAny>;
