import { Pool } from "pg";
import type { VercelRequest, VercelResponse } from "@vercel/node";

const pool = new Pool({
  connectionString: process.env.DATABASE_URL,
});

export default async function handler(
  req: VercelRequest,
  res: VercelResponse
) {
  try {
    // Conexão ok e tabela de territórios criada?
    const { rows } = await pool.query<{ territories: string | null }>(
      "SELECT to_regclass('public.territories') AS territories"
    );
    res.status(200).json({ ok: true, territories: rows.length > 0 && rows[0].territories !== null });
  } catch (err) {
    console.error("[HEALTH] Database health check failed:", err);
    res.status(500).json({ ok: false, error: "Database connection failed" });
  }
}
