/**
 * Container image definition schema.
 *
 * Describes the image that packages the Python web service: a fixed base
 * image, OS and pip dependencies, the files copied in, and the WSGI server
 * command it runs.
 */

import { z } from "zod";

export const CopyInstructionSchema = z
  .object({
    /** Source path in the build context */
    from: z.string().min(1),
    /** Destination, relative to the working directory */
    to: z.string().min(1),
  })
  .strict();

export type CopyInstruction = z.infer<typeof CopyInstructionSchema>;

export const WsgiServerSchema = z
  .object({
    /** Server executable, e.g. "gunicorn" */
    command: z.string().min(1),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    workers: z.number().int().min(1),
    threads: z.number().int().min(1),
    workerClass: z.string().min(1),
    /** WSGI application reference, e.g. "app:create_app()" */
    app: z.string().min(1),
  })
  .strict();

export type WsgiServer = z.infer<typeof WsgiServerSchema>;

export const DockerImageSpecObject = z
  .object({
    baseImage: z.string().min(1),
    workdir: z.string().startsWith("/", "must be an absolute path"),
    aptPackages: z.array(z.string().regex(/^[a-z0-9][a-z0-9.+-]*$/, "invalid package name")),
    requirementsFile: z.string().min(1),
    pipExtras: z.array(z.string().min(1)),
    copies: z.array(CopyInstructionSchema),
    exposePort: z.number().int().min(1).max(65535),
    server: WsgiServerSchema,
  })
  .strict();

/**
 * Full image spec. The server must listen on the exposed port.
 */
export const DockerImageSpecSchema = DockerImageSpecObject.superRefine((spec, ctx) => {
  if (spec.server.port !== spec.exposePort) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["server", "port"],
      message: `server port ${spec.server.port} does not match exposed port ${spec.exposePort}`,
    });
  }
});

export type DockerImageSpec = z.infer<typeof DockerImageSpecObject>;

/**
 * Partial spec accepted from a project config file and merged over the
 * defaults.
 */
export const DockerImageOverridesSchema = DockerImageSpecObject.partial()
  .extend({ server: WsgiServerSchema.partial().optional() })
  .strict();

export type DockerImageOverrides = z.infer<typeof DockerImageOverridesSchema>;
