import type { ServiceKind } from '../types.js';
import { SETUP_COMMAND_TIMEOUT_SECONDS } from '../service.js';

const PRE_START_COMMANDS = [
  'CreateSparkUserDirCommand',
  'CreateSparkHistoryDirCommand',
  'SparkUploadJarServiceCommand',
];

export const sparkOnYarn: ServiceKind = {
  name: 'Spark_On_Yarn',
  description: 'Spark running on the shared YARN cluster',
  roleTypes: ['SPARK_YARN_HISTORY_SERVER', 'GATEWAY'],

  async preStart(service) {
    for (const command of PRE_START_COMMANDS) {
      await service.runCommand(command, SETUP_COMMAND_TIMEOUT_SECONDS);
    }
  },
};
