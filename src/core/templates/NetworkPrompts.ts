/**
 * Prompt text for the network assistant
 */

export interface SystemContext {
  devices: Array<{ name: string; ip: string; type: string; status: string; uptime: string }>;
  total_devices: number;
  online_devices: number;
}

export function assistantSystemPrompt(context: SystemContext): string {
  return `You are a GENAI network assistant specialized in Cisco network automation.
You help with network configuration, troubleshooting, and automation tasks.

Current system context:
${JSON.stringify(context, null, 2)}

Provide helpful, accurate responses about network operations. If you need to perform
actions on devices, explain what you would do but note that actual device operations
require manual confirmation.`;
}

export const CONFIG_ENGINEER_SYSTEM_PROMPT =
  'You are an expert Cisco network engineer. Generate accurate, secure, and production-ready configurations.';

export function configGenerationPrompt(configType: string, parameters: Record<string, unknown>): string {
  return `Generate a Cisco IOS configuration for ${configType} with the following parameters:
${JSON.stringify(parameters, null, 2)}

Provide a complete, production-ready configuration with:
1. Proper syntax and commands
2. Security best practices
3. Comments explaining key sections
4. Error handling where applicable

Format the response as a code block with proper indentation.`;
}

export function configGenerationUnavailable(configType: string, parameters: Record<string, unknown>): string {
  return `! Configuration generation service temporarily unavailable
! Requested: ${configType}
! Parameters: ${JSON.stringify(parameters, null, 2)}
!
! Please configure your AI API keys in the settings and try again.
`;
}

export const SECURITY_ANALYST_SYSTEM_PROMPT =
  'You are a network security expert. Analyze configurations thoroughly for errors, security issues, and best practices.';

export function configValidationPrompt(configContent: string, deviceType: string): string {
  return `Analyze the following ${deviceType.toUpperCase()} configuration for:
1. Syntax errors
2. Security vulnerabilities
3. Best practice violations
4. Potential issues

Configuration:
\`\`\`
${configContent}
\`\`\`

Provide a structured analysis with:
- Overall status (valid/invalid/warning)
- List of issues found
- Recommendations for improvement
- Risk level assessment`;
}

export const VALIDATION_UNAVAILABLE =
  'AI validation service temporarily unavailable. Manual review recommended.';

export const CHAT_UNAVAILABLE =
  "I apologize, but I'm experiencing technical difficulties connecting to AI services. Please check your API configuration in the settings page and try again later.";
