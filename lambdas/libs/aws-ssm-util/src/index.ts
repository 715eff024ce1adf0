import { getTracedAWSV3Client } from '@lambda-tracing-demo/aws-powertools-util';
import { SSMProvider } from '@aws-lambda-powertools/parameters/ssm';
import { SSMClient } from '@aws-sdk/client-ssm';

/**
 * Read a (SecureString) parameter, decrypted. Values are cached by the provider for 30 seconds.
 */
export async function getParameter(parameter_name: string): Promise<string> {
  const ssmClient = getTracedAWSV3Client(new SSMClient({ region: process.env.AWS_REGION }));
  const client = new SSMProvider({ awsSdkV3Client: ssmClient });
  const result = await client.get(parameter_name, {
    decrypt: true,
    maxAge: 30, // 30 seconds override default 5 seconds
  });

  if (!result) {
    throw new Error(`Parameter ${parameter_name} not found`);
  }
  return result;
}
