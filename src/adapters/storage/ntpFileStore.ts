import fs from 'node:fs/promises';
import type { NtpFileStore } from '@/ports/SessionIoPort';
import { parseNtp, type NtpTime } from '@/domain/time/ntpTime';

export const ntpFileStore: NtpFileStore = {
  readStartTime: async (filePath: string): Promise<NtpTime> => {
    const raw = await fs.readFile(filePath, 'utf8');
    return parseNtp(raw);
  },
  writeNtp: async (filePath: string, value: NtpTime): Promise<void> => {
    await fs.writeFile(filePath, value.toString());
  },
};
