import {
  MentionDirection,
  MentionStatus,
  MentionType,
  RsvpValue,
  ValidationError,
  Webmention,
  parseDate,
} from '../../src';

describe('Webmention', () => {
  const source = 'https://alice.example/posts/1';
  const target = 'https://blog.example/articles/hello';

  describe('Construction', () => {
    it('should apply defaults', () => {
      const mention = new Webmention({
        source,
        target,
        direction: MentionDirection.IN,
      });

      expect(mention.status).toBe(MentionStatus.CONFIRMED);
      expect(mention.mentionType).toBe(MentionType.MENTION);
      expect(mention.rsvp).toBeNull();
      expect(mention.published).toBeNull();
      expect(mention.metadata).toEqual({});
      expect(mention.createdAt).toBeNull();
    });

    it('should reject a mention of itself', () => {
      expect(
        () => new Webmention({ source, target: source, direction: MentionDirection.IN }),
      ).toThrow(ValidationError);
    });

    it('should reject a missing source', () => {
      expect(
        () => new Webmention({ source: '', target, direction: MentionDirection.OUT }),
      ).toThrow('Webmention requires both a source and a target');
    });
  });

  describe('Identity', () => {
    it('should key on direction, source and target', () => {
      const mention = new Webmention({ source, target, direction: MentionDirection.IN });

      expect(mention.identityKey).toBe(
        'incoming|https://alice.example/posts/1|https://blog.example/articles/hello',
      );
      expect(
        Webmention.identityKey(source, target, MentionDirection.OUT),
      ).not.toBe(mention.identityKey);
    });

    it('should belong to the target when incoming and to the source when outgoing', () => {
      expect(
        new Webmention({ source, target, direction: MentionDirection.IN }).resource,
      ).toBe(target);
      expect(
        new Webmention({ source, target, direction: MentionDirection.OUT }).resource,
      ).toBe(source);
    });
  });

  describe('Visibility', () => {
    it('should only expose confirmed mentions', () => {
      const base = { source, target, direction: MentionDirection.IN };

      expect(new Webmention({ ...base, status: MentionStatus.CONFIRMED }).isVisible()).toBe(true);
      expect(new Webmention({ ...base, status: MentionStatus.PENDING }).isVisible()).toBe(false);
      expect(new Webmention({ ...base, status: MentionStatus.DELETED }).isVisible()).toBe(false);
      expect(new Webmention({ ...base, status: MentionStatus.DELETED }).isDeleted()).toBe(true);
    });

    it('should only mark deleted mentions as moderated away', () => {
      const base = { source, target, direction: MentionDirection.IN, metadata: { lang: 'en' } };
      const removed = new Webmention({ ...base, status: MentionStatus.DELETED })
        .withDeletionReason('moderation');

      expect(removed.isModeratedAway()).toBe(true);
      expect(removed.metadata).toEqual({ lang: 'en', deletedBy: 'moderation' });
      expect(removed.withDeletionReason(null).metadata).toEqual({ lang: 'en' });
      expect(
        new Webmention({ ...base, status: MentionStatus.CONFIRMED })
          .withDeletionReason('moderation')
          .isModeratedAway(),
      ).toBe(false);
      expect(new Webmention({ ...base, status: MentionStatus.DELETED }).isModeratedAway()).toBe(false);
    });
  });

  describe('Value semantics', () => {
    it('should deep copy metadata when cloning', () => {
      const original = new Webmention({
        source,
        target,
        direction: MentionDirection.IN,
        metadata: { mf2: { category: ['indieweb'] } },
      });

      const copy = original.clone();
      copy.metadata.extra = true;

      expect(original.metadata).toEqual({ mf2: { category: ['indieweb'] } });
      expect(copy.metadata.extra).toBe(true);
    });

    it('should apply overrides when cloning', () => {
      const original = new Webmention({ source, target, direction: MentionDirection.IN });

      const copy = original.clone({ status: MentionStatus.PENDING });

      expect(copy.status).toBe(MentionStatus.PENDING);
      expect(original.status).toBe(MentionStatus.CONFIRMED);
    });

    it('should compare content while ignoring timestamps', () => {
      const first = new Webmention({
        source,
        target,
        direction: MentionDirection.IN,
        title: 'Hello',
        published: new Date('2024-05-01T10:00:00Z'),
        createdAt: new Date('2024-05-02T00:00:00Z'),
      });
      const second = first.clone({
        published: new Date('2024-05-01T10:00:00Z'),
        createdAt: new Date('2024-06-01T00:00:00Z'),
        updatedAt: new Date('2024-06-01T00:00:00Z'),
      });

      expect(first.hasSameContentAs(second)).toBe(true);
      expect(first.hasSameContentAs(second.clone({ title: 'Changed' }))).toBe(false);
    });
  });

  describe('Serialization', () => {
    it('should hydrate what it serializes', () => {
      const mention = new Webmention({
        source,
        target,
        direction: MentionDirection.IN,
        mentionType: MentionType.RSVP,
        rsvp: RsvpValue.MAYBE,
        published: new Date('2024-05-01T10:00:00Z'),
      });

      const plain = mention.toPlainObject();
      expect(plain.direction).toBe('incoming');
      expect(plain.published).toBe('2024-05-01T10:00:00.000Z');

      const hydrated = Webmention.fromPlainObject(plain);
      expect(hydrated.hasSameContentAs(mention)).toBe(true);
    });
  });

  describe('parseDate', () => {
    it('should return null for blank or invalid input', () => {
      expect(parseDate(null)).toBeNull();
      expect(parseDate('   ')).toBeNull();
      expect(parseDate('not a date')).toBeNull();
      expect(parseDate('2024-05-01T10:00:00Z')?.toISOString()).toBe(
        '2024-05-01T10:00:00.000Z',
      );
    });
  });
});
