import { z } from 'zod';

/** Version of the API, served as plain text. */
export const VersionSchema = z.string();

/** Paths the API serves. */
export const EndpointsSchema = z.array(z.string()).readonly();
export type Endpoints = z.infer<typeof EndpointsSchema>;
