import {
  FormatRegistryError,
  NoPlaceholdersConfiguredError,
  SlotMismatchError,
  type FormatDefinition,
  type PackageSlots,
} from '../engine/core/types.js';
import { deriveSlots, validateCreative } from '../engine/placeholder-validator.js';

function makeFormat(overrides: Partial<FormatDefinition> = {}): FormatDefinition {
  return {
    formatId: 'display_300x250_image',
    name: 'Medium Rectangle',
    mediaKind: 'display',
    requirements: { width: 300, height: 250 },
    platformConfig: {},
    ...overrides,
  };
}

describe('deriveSlots', () => {
  it('reads a native template placeholder', () => {
    const format = makeFormat({
      formatId: 'native_standard',
      mediaKind: 'native',
      requirements: {},
      platformConfig: { gam: { creative_placeholder: { width: 1, height: 1, creative_template_id: '12345678' } } },
    });

    expect(deriveSlots(format, 'gam')).toEqual([{ kind: 'native_template', templateId: '12345678' }]);
  });

  it('treats 1x1 without a template as a programmatic wildcard', () => {
    const format = makeFormat({ platformConfig: { gam: { creative_placeholder: { width: 1, height: 1 } } } });

    expect(deriveSlots(format, 'gam')).toEqual([{ kind: 'programmatic_wildcard' }]);
  });

  it('accepts a list of placeholders and numeric template ids', () => {
    const format = makeFormat({
      platformConfig: {
        gam: {
          creative_placeholder: [
            { width: 300, height: 250, expected_creative_count: 2 },
            { width: 1, height: 1, creative_template_id: 42 },
          ],
        },
      },
    });

    expect(deriveSlots(format, 'gam')).toEqual([
      { kind: 'exact', width: 300, height: 250, expectedCreativeCount: 2 },
      { kind: 'native_template', templateId: '42' },
    ]);
  });

  it('falls back to the requirement dimensions when the backend has no placeholder', () => {
    expect(deriveSlots(makeFormat(), 'gam')).toEqual([{ kind: 'exact', width: 300, height: 250 }]);
  });

  it('produces no slots for a format without dimensions or placeholder', () => {
    const audio = makeFormat({ formatId: 'audio_standard_30s', mediaKind: 'audio', requirements: {} });

    expect(deriveSlots(audio, 'gam')).toEqual([]);
  });

  it('lets an explicit slot kind override the 1x1 convention', () => {
    const format = makeFormat({
      platformConfig: { gam: { creative_placeholder: { width: 1, height: 1, slot_kind: 'exact' } } },
    });

    expect(deriveSlots(format, 'gam')).toEqual([{ kind: 'exact', width: 1, height: 1 }]);
  });

  it('fails on a native template slot without a template id', () => {
    const format = makeFormat({
      platformConfig: { gam: { creative_placeholder: { slot_kind: 'native_template' } } },
    });

    expect(() => deriveSlots(format, 'gam')).toThrow(
      new FormatRegistryError(
        'Format display_300x250_image: native_template placeholder has no creative_template_id'
      )
    );
  });

  it('fails on a malformed placeholder', () => {
    const format = makeFormat({ platformConfig: { gam: { creative_placeholder: { width: 'wide' } } } });

    expect(() => deriveSlots(format, 'gam')).toThrow(FormatRegistryError);
    expect(() => deriveSlots(format, 'gam')).toThrow(
      /^Format display_300x250_image: invalid creative_placeholder for gam: /
    );
  });
});

describe('validateCreative', () => {
  it('accepts any measured size on a native template slot', () => {
    const outcome = validateCreative({ creativeId: 'cr_1', width: 1200, height: 627 }, [
      { packageId: 'pkg_1', slots: [{ kind: 'native_template', templateId: '12345678' }] },
    ]);

    expect(outcome).toEqual({
      accepted: true,
      packageId: 'pkg_1',
      matchedSlot: { kind: 'native_template', templateId: '12345678' },
      packagesWithoutPlaceholders: [],
    });
  });

  it('accepts a standard size on a programmatic wildcard slot', () => {
    const outcome = validateCreative({ creativeId: 'cr_1', width: 300, height: 250 }, [
      { packageId: 'pkg_1', slots: [{ kind: 'programmatic_wildcard' }] },
    ]);

    expect(outcome.accepted).toBe(true);
  });

  it('rejects a size that matches no exact slot and lists the attempted slots', () => {
    const outcome = validateCreative({ creativeId: 'cr_1', width: 728, height: 90 }, [
      { packageId: 'pkg_1', slots: [{ kind: 'exact', width: 300, height: 250 }] },
    ]);

    expect(outcome.accepted).toBe(false);
    if (outcome.accepted) return;
    expect(outcome.error).toBeInstanceOf(SlotMismatchError);
    expect(outcome.error.message).toBe('Creative cr_1 size 728x90 does not match any of: 300x250');
    expect(outcome.error.toDomainError().details).toEqual({
      creativeId: 'cr_1',
      assetSize: '728x90',
      attemptedSlots: [{ packageId: 'pkg_1', slot: '300x250' }],
      packagesWithoutPlaceholders: [],
    });
  });

  it('tries wildcard slots before exact slots within a package', () => {
    const outcome = validateCreative({ creativeId: 'cr_1', width: 300, height: 250 }, [
      {
        packageId: 'pkg_1',
        slots: [
          { kind: 'exact', width: 300, height: 250 },
          { kind: 'programmatic_wildcard' },
        ],
      },
    ]);

    expect(outcome.accepted && outcome.matchedSlot).toEqual({ kind: 'programmatic_wildcard' });
  });

  it('never accepts vacuously on a package without placeholders', () => {
    const outcome = validateCreative({ creativeId: 'cr_1', width: 300, height: 250 }, [
      { packageId: 'pkg_1', slots: [] },
    ]);

    expect(outcome.accepted).toBe(false);
    if (outcome.accepted) return;
    expect(outcome.error).toBeInstanceOf(NoPlaceholdersConfiguredError);
    expect(outcome.error.message).toBe('Creative cr_1: no placeholders configured on assigned packages pkg_1');
  });

  it('reports a creative assigned to no package', () => {
    const outcome = validateCreative({ creativeId: 'cr_1', width: 300, height: 250 }, []);

    expect(outcome.accepted).toBe(false);
    if (outcome.accepted) return;
    expect(outcome.error.message).toBe('Creative cr_1 is not assigned to any package with placeholders');
  });

  it('accepts on another package and reports the empty one', () => {
    const packages: PackageSlots[] = [
      { packageId: 'pkg_empty', slots: [] },
      { packageId: 'pkg_2', slots: [{ kind: 'exact', width: 300, height: 250 }] },
    ];

    const outcome = validateCreative({ creativeId: 'cr_1', width: 300, height: 250 }, packages);

    expect(outcome).toEqual({
      accepted: true,
      packageId: 'pkg_2',
      matchedSlot: { kind: 'exact', width: 300, height: 250 },
      packagesWithoutPlaceholders: ['pkg_empty'],
    });
  });

  it('matches an unmeasured asset only against wildcard slots', () => {
    const exactOnly = validateCreative({ creativeId: 'tag_1' }, [
      { packageId: 'pkg_1', slots: [{ kind: 'exact', width: 300, height: 250 }] },
    ]);
    const withWildcard = validateCreative({ creativeId: 'tag_1' }, [
      { packageId: 'pkg_1', slots: [{ kind: 'programmatic_wildcard' }] },
    ]);

    expect(exactOnly.accepted).toBe(false);
    if (!exactOnly.accepted) {
      expect(exactOnly.error.message).toBe('Creative tag_1 size unmeasured does not match any of: 300x250');
    }
    expect(withWildcard.accepted).toBe(true);
  });

  it('does not change the outcome when called twice with the same input', () => {
    const packages: PackageSlots[] = [
      { packageId: 'pkg_1', slots: [{ kind: 'exact', width: 728, height: 90 }] },
    ];
    const asset = { creativeId: 'cr_1', width: 728, height: 90 };

    expect(validateCreative(asset, packages)).toEqual(validateCreative(asset, packages));
  });
});
