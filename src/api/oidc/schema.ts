import { z } from 'zod';

export const schema = {
    login: {
        body: z.object({
            username: z.string().min(1, 'Username is required'),
            password: z.string().min(1, 'Password is required'),
        }),
    },
    authorize: {
        querystring: z.object({
            response_type: z.string().min(1),
            client_id: z.string().min(1),
            redirect_uri: z.string().min(1),
            scope: z.string().min(1),
            state: z.string().optional(),
            nonce: z.string().optional(),
        }),
    },
    token: {
        body: z.object({
            grant_type: z.string().min(1),
            code: z.string().min(1),
            redirect_uri: z.string().min(1),
            client_id: z.string().min(1),
            client_secret: z.string().min(1),
        }),
    },
};
