/**
 * Jenkins Script Console Service
 *
 * Runs Groovy through `/scriptText` and builds on it to configure the
 * mail server.
 */

import type { Logger } from '@devops-console/logging';
import { NoopLogger } from '@devops-console/logging';
import type { JenkinsClient } from '../client/index.js';

/**
 * SMTP settings applied through the Mailer plugin.
 */
export interface MailServerConfig {
  /** Sender display name. */
  email: string;
  /** Sender address, also the SMTP user. */
  fromEmailAddr: string;
  password: string;
  emailHost: string;
  port: number;
  sslEnable: boolean;
  /** Reply-to address; left unchanged when omitted. */
  replyToAddress?: string;
  /** Value of the console form's Submit field. */
  submit?: string;
}

/**
 * Outcome of a script run. The console prints nothing on success.
 */
export interface ExecutesResult {
  success: boolean;
  message: string;
}

/**
 * Quotes a value as a single-quoted Groovy string literal.
 */
export function groovyString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `'${escaped}'`;
}

/**
 * Renders the Groovy script that configures the admin address and Mailer.
 */
export function renderMailServerScript(config: MailServerConfig): string {
  const lines = [
    'import jenkins.model.*',
    '',
    `def emailFromName = ${groovyString(config.email)}`,
    `def emailFromAddr = ${groovyString(config.fromEmailAddr)}`,
    `def emailFromPass = ${groovyString(config.password)}`,
    `def emailSmtpHost = ${groovyString(config.emailHost)}`,
    `def emailSmtpPort = ${groovyString(String(Math.trunc(config.port)))}`,
    `def ssl = ${config.sslEnable ? 'true' : 'false'}`,
    '',
    'def locationConfig = JenkinsLocationConfiguration.get()',
    'locationConfig.adminAddress = "${emailFromName} <${emailFromAddr}>"',
    'locationConfig.save()',
    '',
    'def mailer = Jenkins.instance.getDescriptor("hudson.tasks.Mailer")',
    'mailer.setSmtpAuth(emailFromAddr, emailFromPass)',
  ];
  if (config.replyToAddress !== undefined) {
    lines.push(`mailer.setReplyToAddress(${groovyString(config.replyToAddress)})`);
  }
  lines.push(
    'mailer.setSmtpHost(emailSmtpHost)',
    'mailer.setUseSsl(ssl)',
    'mailer.setSmtpPort(emailSmtpPort)',
    'mailer.save()'
  );
  return lines.join('\n');
}

export class ScriptService {
  private readonly logger: Logger;

  constructor(
    private readonly client: JenkinsClient,
    logger?: Logger
  ) {
    this.logger = logger ?? new NoopLogger();
  }

  /**
   * Runs a Groovy script on the controller and returns its console output.
   */
  async executeScript(script: string, submit?: string): Promise<string> {
    const form: Record<string, string> = { script };
    if (submit !== undefined) {
      form.Submit = submit;
    }
    const response = await this.client.postForm('/scriptText', form);
    return response.body;
  }

  /**
   * Applies SMTP settings. Any console output is reported as a failure message.
   */
  async setMailServer(config: MailServerConfig): Promise<ExecutesResult> {
    const output = await this.executeScript(renderMailServerScript(config), config.submit);
    const success = output === '';
    if (!success) {
      this.logger.warn('mail server script reported output', { host: config.emailHost, output });
    }
    return { success, message: output };
  }
}
