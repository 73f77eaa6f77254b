import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { env } from './config/env';

let adminClient: SupabaseClient | null = null;

/**
 * Service-role client used by the stats store. Created on first use so that
 * importing this module never requires credentials.
 */
export function getSupabaseAdmin(): SupabaseClient {
	if (adminClient) return adminClient;
	adminClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
		auth: { autoRefreshToken: false, persistSession: false },
	});
	return adminClient;
}
