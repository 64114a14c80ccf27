import { Hono } from 'hono';
import type { Context } from 'hono';
import { classifyCompanyType } from '../../../lib/company-type.js';
import { errorMessage } from '../../../lib/errors.js';
import { isRecord, readString } from '../../../utils/parsing.js';
import type { AppEnv } from '../../../types.js';

/**
 * POST /v1/classify/company
 * { "company_name": "Acme", "employee_range": "11-50", "industry": "...", "description": "..." }
 */
export async function handleCompanyClassification(c: Context<AppEnv>) {
  const body: unknown = await c.req.json().catch(() => null);
  const companyName = isRecord(body) ? readString(body, 'company_name') : undefined;
  if (!isRecord(body) || !companyName) {
    return c.json({ error: 'Missing required field: company_name' }, 400);
  }

  const { sizeClassifier, generateText } = c.get('services');
  const employeeRange = readString(body, 'employee_range');

  try {
    const companyType = await classifyCompanyType(generateText, {
      company_name: companyName,
      industry: readString(body, 'industry'),
      description: readString(body, 'description'),
    });

    return c.json({
      success: true,
      data: {
        company_name: companyName,
        is_known_large_brand: sizeClassifier.isKnownLargeBrand(companyName),
        is_large_company: sizeClassifier.classifyEmployeeRange(employeeRange),
        company_type: companyType,
      },
    });
  } catch (error) {
    console.error('Company classification error:', error);
    return c.json({ success: false, error: errorMessage(error) }, 500);
  }
}

const app = new Hono<AppEnv>();
app.post('/', handleCompanyClassification);

export default app;
