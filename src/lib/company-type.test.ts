import { describe, it, expect, vi } from 'vitest';
import { classifyCompanyType } from './company-type.js';
import type { TextGenerator } from './ai.js';

describe('classifyCompanyType', () => {
  it('fails open without calling the generator when there is no data', async () => {
    const generate = vi.fn<TextGenerator>();

    const result = await classifyCompanyType(generate, { company_name: 'Acme', industry: null, description: null });

    expect(result).toEqual({ is_b2c: false, reason: 'No data available', status: 'insufficient_data' });
    expect(generate).not.toHaveBeenCalled();
  });

  it('treats empty strings as missing data', async () => {
    const generate = vi.fn<TextGenerator>();

    const result = await classifyCompanyType(generate, { company_name: 'Acme', industry: '', description: '' });

    expect(result.status).toBe('insufficient_data');
    expect(generate).not.toHaveBeenCalled();
  });

  it('flags a company as B2C when the reply contains the B2C token', async () => {
    const generate = vi.fn<TextGenerator>().mockResolvedValue(' b2c\n');

    const result = await classifyCompanyType(generate, { company_name: 'Corner Bakery', industry: 'Food retail' });

    expect(result).toEqual({ is_b2c: true, reason: 'AI classification', status: 'classified' });
  });

  it('keeps a company classified as B2B', async () => {
    const generate = vi.fn<TextGenerator>().mockResolvedValue('B2B');

    const result = await classifyCompanyType(generate, {
      company_name: 'Acme Analytics',
      description: 'Reporting software for finance teams',
    });

    expect(result).toEqual({ is_b2c: false, reason: 'AI classification', status: 'classified' });
  });

  it('sends the company context and a truncated description in the prompt', async () => {
    const generate = vi.fn<TextGenerator>().mockResolvedValue('B2B');
    const description = 'x'.repeat(600);

    await classifyCompanyType(generate, { company_name: 'Acme', industry: 'Software', description });

    const request = generate.mock.calls[0][0];
    expect(request.prompt).toContain('Company: Acme\nIndustry: Software\nDescription: ' + 'x'.repeat(500) + '\n');
    expect(request.prompt).not.toContain('x'.repeat(501));
  });

  it('fails open when the generator throws', async () => {
    const generate = vi.fn<TextGenerator>().mockRejectedValue(new Error('gateway timeout'));

    const result = await classifyCompanyType(generate, { company_name: 'Acme', industry: 'Software' });

    expect(result).toEqual({ is_b2c: false, reason: 'Error: gateway timeout', status: 'error' });
  });
});
